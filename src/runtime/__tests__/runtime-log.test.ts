import { describe, expect, it } from "vitest"
import { compileOrThrow } from "../../compiler/compile"
import { execute } from "../interpreter"
import { createRuntimeLog } from "../runtime-log"

describe("RuntimeLog", () => {
	it("records messages in order", () => {
		const log = createRuntimeLog()
		log.output(3, "hello\n")
		log.trap(5, "main", new Error("boom"))
		log.trap(6, "f", "plain failure")
		log.exit(6, 1)

		expect(log.getMessages()).toEqual([
			{ type: "output", step: 3, text: "hello\n" },
			{ type: "trap", step: 5, functionName: "main", error: "boom" },
			{ type: "trap", step: 6, functionName: "f", error: "plain failure" },
			{ type: "exit", step: 6, code: 1 },
		])
	})

	it("collects one output message per print call", () => {
		const log = createRuntimeLog()
		const result = execute(compileOrThrow("print(1); print(2);", "log.tpl"), { log })

		expect(result.log).toBe(log)
		const messages = log.getMessages()
		expect(messages.map((m) => m.type)).toEqual(["output", "output", "exit"])
		expect(messages.flatMap((m) => (m.type === "output" ? [m.text] : []))).toEqual(["1\n", "2\n"])
		expect(messages[2]).toMatchObject({ type: "exit", code: 0 })
	})

	it("records the trap that stopped a run", () => {
		const result = execute(compileOrThrow("int32 a = 0; print(10 / a);", "trap.tpl"))
		const trap = result.log.getMessages().find((m) => m.type === "trap")
		expect(trap).toMatchObject({ type: "trap", functionName: "main", error: "division by zero" })
	})
})
