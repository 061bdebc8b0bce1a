export { execute, RuntimeTrap, DEFAULT_MAX_STEPS, DEFAULT_MAX_CALL_DEPTH, MAX_ALLOCATION_CELLS } from "./interpreter"
export type { ExecuteOptions, ExecutionResult } from "./interpreter"
export { createRuntimeLog } from "./runtime-log"
export type { RuntimeLog, RuntimeMessage, RuntimeMessageType, OutputMessage, TrapMessage, ExitMessage } from "./runtime-log"
