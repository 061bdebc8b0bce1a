/**
 * Reference interpreter for IR modules.
 *
 * Integers are BigInts wrapped to their declared width after every operation.
 * Stack slots are cells; a pointer is a cell plus a path of array indices
 * into the cell's value. Strings are JS strings.
 */
import type {
	BasicBlock,
	BinaryOpcode,
	CallInst,
	IRFunction,
	IRModule,
	IcmpPredicate,
	Instruction,
	Operand,
	Reg,
} from "../compiler/ir"
import { type Type, elementCount } from "../compiler/types"
import { type RuntimeLog, createRuntimeLog } from "./runtime-log"

export interface ExecuteOptions {
	/** Instructions executed before the run is stopped. Default 10 000 000. */
	readonly maxSteps?: number
	/** Nested calls allowed before the run is stopped. Default 2 000. */
	readonly maxCallDepth?: number
	readonly entry?: string
	readonly log?: RuntimeLog
}

export interface ExecutionResult {
	/** Value returned by the entry function, or 1 after a trap. */
	readonly exitCode: number
	readonly output: string
	readonly trap: RuntimeTrap | null
	readonly log: RuntimeLog
}

/** A condition that stops execution: division by zero, null dereference, bad index, a resource limit. */
export class RuntimeTrap extends Error {
	readonly functionName: string

	constructor(message: string, functionName: string) {
		super(message)
		this.name = "RuntimeTrap"
		this.functionName = functionName
	}
}

export const DEFAULT_MAX_STEPS = 10_000_000
export const DEFAULT_MAX_CALL_DEPTH = 2_000
/** Largest number of scalar elements a single stack slot may hold. */
export const MAX_ALLOCATION_CELLS = 1 << 24

export function execute(module: IRModule, options: ExecuteOptions = {}): ExecutionResult {
	const log = options.log ?? createRuntimeLog()
	const machine = new Machine(
		module,
		log,
		options.maxSteps ?? DEFAULT_MAX_STEPS,
		options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH,
	)
	const entry = options.entry ?? "main"

	try {
		const result = machine.run(entry)
		const exitCode = typeof result === "bigint" ? Number(result) : 0
		log.exit(machine.steps, exitCode)
		return { exitCode, output: machine.output, trap: null, log }
	} catch (e) {
		if (!(e instanceof RuntimeTrap)) throw e
		log.trap(machine.steps, e.functionName, e)
		log.exit(machine.steps, 1)
		return { exitCode: 1, output: machine.output, trap: e, log }
	}
}

// --- Values ---

interface Cell {
	value: Value
}

interface Pointer {
	readonly kind: "pointer"
	readonly cell: Cell
	readonly path: readonly number[]
}

interface FunctionRef {
	readonly kind: "function"
	readonly name: string
}

// Integers and bools are bigint; null is a null pointer or function value
type Value = bigint | string | Pointer | FunctionRef | Value[] | null

function zeroOf(type: Type): Value {
	switch (type.kind) {
		case "int":
		case "bool":
			return 0n
		case "str":
			return ""
		case "array":
			return Array.from({ length: type.length }, () => zeroOf(type.inner))
		default:
			return null
	}
}

// Arrays are values: every load and store copies them
function copyValue(value: Value): Value {
	return Array.isArray(value) ? value.map(copyValue) : value
}

function wrap(value: bigint, type: Type): bigint {
	if (type.kind === "int") return BigInt.asIntN(type.width, value)
	if (type.kind === "bool") return BigInt.asUintN(1, value)
	return value
}

// --- Machine ---

interface Frame {
	readonly fn: IRFunction
	readonly regs: Map<number, Value>
	readonly locals: Map<string, Value>
	block: BasicBlock
	// Index of the next instruction in `block`
	next: number
	// Register waiting for the result of the call this frame is suspended on
	pending: Reg | null
}

class Machine {
	private log: RuntimeLog
	private maxSteps: number
	private maxCallDepth: number
	private functions = new Map<string, IRFunction>()
	private blocks = new Map<IRFunction, Map<string, BasicBlock>>()
	private strings = new Map<string, string>()
	private stack: Frame[] = []
	steps = 0
	output = ""

	constructor(module: IRModule, log: RuntimeLog, maxSteps: number, maxCallDepth: number) {
		this.log = log
		this.maxSteps = maxSteps
		this.maxCallDepth = maxCallDepth
		for (const fn of module.functions) {
			this.functions.set(fn.name, fn)
			this.blocks.set(fn, new Map(fn.blocks.map((b) => [b.label, b])))
		}
		for (const g of module.globals) {
			this.strings.set(g.name, g.value)
		}
	}

	/**
	 * Runs `entry` to completion. Calls push frames on an explicit stack
	 * rather than recursing, so call depth is bounded only by `maxCallDepth`.
	 */
	run(entry: string): Value {
		this.enter(entry, [], entry)

		while (true) {
			const frame = this.stack[this.stack.length - 1]
			if (!frame) throw new RuntimeTrap("call stack is empty", entry)

			const inst = frame.block.instructions[frame.next]
			if (inst) {
				frame.next++
				this.tick(frame.fn)
				if (inst.kind === "call") {
					this.callInstruction(inst, frame)
				} else {
					this.exec(inst, frame)
				}
				continue
			}

			this.tick(frame.fn)
			const term = frame.block.terminator
			switch (term.kind) {
				case "br":
					this.jump(frame, term.target)
					break
				case "condbr":
					this.jump(frame, this.int(term.cond, frame) !== 0n ? term.ifTrue : term.ifFalse)
					break
				case "ret": {
					const result = term.value ? this.operand(term.value, frame) : null
					this.stack.pop()
					const caller = this.stack[this.stack.length - 1]
					if (!caller) return result
					if (caller.pending) caller.regs.set(caller.pending.id, result)
					caller.pending = null
					break
				}
				case "unreachable":
					throw new RuntimeTrap("reached unreachable code", frame.fn.name)
			}
		}
	}

	private callInstruction(inst: CallInst, frame: Frame): void {
		const fnName = frame.fn.name
		const callee = this.operand(inst.callee, frame)
		if (callee === null) throw new RuntimeTrap("call through a null function value", fnName)
		if (typeof callee !== "object" || Array.isArray(callee) || callee.kind !== "function") {
			throw new RuntimeTrap("call of a non-function value", fnName)
		}
		const args = inst.args.map((a) => copyValue(this.operand(a, frame)))
		if (this.functions.has(callee.name)) {
			frame.pending = inst.dest
			this.enter(callee.name, args, fnName)
			return
		}
		const result = this.callExtern(callee.name, args, fnName)
		if (inst.dest) frame.regs.set(inst.dest.id, result)
	}

	private enter(name: string, args: Value[], caller: string): void {
		const fn = this.functions.get(name)
		const [entry] = fn?.blocks ?? []
		if (!fn || !entry) throw new RuntimeTrap(`call to unknown function '${name}'`, caller)
		if (this.stack.length >= this.maxCallDepth) {
			throw new RuntimeTrap(`call depth limit of ${this.maxCallDepth} exceeded`, name)
		}

		const frame: Frame = { fn, regs: new Map(), locals: new Map(), block: entry, next: 0, pending: null }
		fn.params.forEach((p, i) => frame.regs.set(p.id, args[i] ?? this.zero(p.type, name)))
		for (const local of fn.locals) {
			frame.locals.set(local.name, this.zero(local.type, name))
		}
		this.stack.push(frame)
	}

	private jump(frame: Frame, label: string): void {
		const block = this.blocks.get(frame.fn)?.get(label)
		if (!block) throw new RuntimeTrap(`branch to missing block '${label}'`, frame.fn.name)
		frame.block = block
		frame.next = 0
	}

	private tick(fn: IRFunction): void {
		if (++this.steps > this.maxSteps) {
			throw new RuntimeTrap(`step limit of ${this.maxSteps} exceeded`, fn.name)
		}
	}

	private zero(type: Type, fnName: string): Value {
		const cells = elementCount(type)
		if (cells > MAX_ALLOCATION_CELLS) {
			throw new RuntimeTrap(`allocation of ${cells} elements exceeds the limit of ${MAX_ALLOCATION_CELLS}`, fnName)
		}
		return zeroOf(type)
	}

	// --- Instructions ---

	private exec(inst: Exclude<Instruction, CallInst>, frame: Frame): void {
		const fnName = frame.fn.name
		switch (inst.kind) {
			case "alloca":
				frame.regs.set(inst.dest.id, { kind: "pointer", cell: { value: this.zero(inst.allocated, fnName) }, path: [] })
				break
			case "load":
				frame.regs.set(inst.dest.id, copyValue(this.readPointer(this.pointer(inst.ptr, frame), fnName)))
				break
			case "store":
				this.writePointer(this.pointer(inst.ptr, frame), copyValue(this.operand(inst.value, frame)), fnName)
				break
			case "local.get": {
				const value = frame.locals.get(inst.local)
				if (value === undefined) throw new RuntimeTrap(`undeclared local '${inst.local}'`, fnName)
				frame.regs.set(inst.dest.id, copyValue(value))
				break
			}
			case "local.set":
				frame.locals.set(inst.local, copyValue(this.operand(inst.value, frame)))
				break
			case "binary": {
				const result = arith(inst.op, this.int(inst.lhs, frame), this.int(inst.rhs, frame), fnName)
				frame.regs.set(inst.dest.id, wrap(result, inst.dest.type))
				break
			}
			case "icmp":
				frame.regs.set(inst.dest.id, this.compare(inst.pred, inst.lhs, inst.rhs, frame) ? 1n : 0n)
				break
			case "not":
				frame.regs.set(inst.dest.id, this.int(inst.operand, frame) === 0n ? 1n : 0n)
				break
			case "cast": {
				const value = this.int(inst.value, frame)
				const source = inst.value.type
				// zext reads the source bits as unsigned; trunc and sext only rewrap
				const widened = inst.op === "zext" && source.kind === "int" ? BigInt.asUintN(source.width, value) : value
				frame.regs.set(inst.dest.id, wrap(widened, inst.dest.type))
				break
			}
			case "gep": {
				const base = this.pointer(inst.base, frame)
				if (!base) throw new RuntimeTrap("null pointer dereference", fnName)
				const index = Number(this.int(inst.index, frame))
				frame.regs.set(inst.dest.id, offsetPointer(base, index, inst.throughArray, fnName))
				break
			}
			case "select": {
				const cond = this.int(inst.cond, frame)
				frame.regs.set(inst.dest.id, this.operand(cond !== 0n ? inst.ifTrue : inst.ifFalse, frame))
				break
			}
		}
	}

	private compare(pred: IcmpPredicate, lhs: Operand, rhs: Operand, frame: Frame): boolean {
		const a = this.operand(lhs, frame)
		const b = this.operand(rhs, frame)
		if (typeof a === "bigint" && typeof b === "bigint") {
			switch (pred) {
				case "eq":
					return a === b
				case "ne":
					return a !== b
				case "slt":
					return a < b
				case "sgt":
					return a > b
				case "sle":
					return a <= b
				case "sge":
					return a >= b
			}
		}
		// Pointers compare by identity of cell and path
		const same = samePointer(a, b)
		if (pred === "eq") return same
		if (pred === "ne") return !same
		throw new RuntimeTrap(`cannot order non-integer values with '${pred}'`, frame.fn.name)
	}

	// --- Externs ---

	private callExtern(name: string, args: Value[], caller: string): Value {
		switch (name) {
			case "printf": {
				const [format, ...rest] = args
				if (typeof format !== "string") throw new RuntimeTrap("printf: format is not a string", caller)
				const text = formatPrintf(format, rest, caller)
				this.output += text
				this.log.output(this.steps, text)
				return BigInt(new TextEncoder().encode(text).length)
			}
			case "tpl_concat": {
				const [a, b] = args
				if (typeof a !== "string" || typeof b !== "string") {
					throw new RuntimeTrap("tpl_concat: arguments must be strings", caller)
				}
				return a + b
			}
			case "tpl_i128_to_str": {
				const [value] = args
				if (typeof value !== "bigint") throw new RuntimeTrap("tpl_i128_to_str: argument must be an integer", caller)
				return value.toString()
			}
		}
		throw new RuntimeTrap(`call to unknown function '${name}'`, caller)
	}

	// --- Operands ---

	private operand(op: Operand, frame: Frame): Value {
		switch (op.kind) {
			case "reg": {
				const value = frame.regs.get(op.id)
				if (value === undefined) throw new RuntimeTrap(`register %${op.id} read before it was set`, frame.fn.name)
				return value
			}
			case "const":
				return op.value
			case "global": {
				const value = this.strings.get(op.name)
				if (value === undefined) throw new RuntimeTrap(`unknown global '@${op.name}'`, frame.fn.name)
				return value
			}
			case "func":
				return { kind: "function", name: op.name }
			case "zero":
				return this.zero(op.type, frame.fn.name)
		}
	}

	private int(op: Operand, frame: Frame): bigint {
		const value = this.operand(op, frame)
		if (typeof value !== "bigint") throw new RuntimeTrap("expected an integer operand", frame.fn.name)
		return value
	}

	private pointer(op: Operand, frame: Frame): Pointer | null {
		const value = this.operand(op, frame)
		if (value === null) return null
		if (typeof value !== "object" || Array.isArray(value) || value.kind !== "pointer") {
			throw new RuntimeTrap("expected a pointer operand", frame.fn.name)
		}
		return value
	}

	private readPointer(ptr: Pointer | null, fnName: string): Value {
		if (!ptr) throw new RuntimeTrap("null pointer dereference", fnName)
		let value = ptr.cell.value
		for (const index of ptr.path) {
			value = elementAt(value, index, fnName)
		}
		return value
	}

	private writePointer(ptr: Pointer | null, value: Value, fnName: string): void {
		if (!ptr) throw new RuntimeTrap("null pointer dereference", fnName)
		const last = ptr.path[ptr.path.length - 1]
		if (last === undefined) {
			ptr.cell.value = value
			return
		}
		let container = ptr.cell.value
		for (const index of ptr.path.slice(0, -1)) {
			container = elementAt(container, index, fnName)
		}
		if (!Array.isArray(container) || last < 0 || last >= container.length) {
			throw new RuntimeTrap(`index ${last} out of range`, fnName)
		}
		container[last] = value
	}
}

// --- Helpers ---

function arith(op: BinaryOpcode, a: bigint, b: bigint, fnName: string): bigint {
	switch (op) {
		case "add":
			return a + b
		case "sub":
			return a - b
		case "mul":
			return a * b
		case "sdiv":
			if (b === 0n) throw new RuntimeTrap("division by zero", fnName)
			return a / b
		case "srem":
			if (b === 0n) throw new RuntimeTrap("division by zero", fnName)
			return a % b
		case "and":
			return a & b
		case "or":
			return a | b
	}
}

function elementAt(value: Value, index: number, fnName: string): Value {
	if (!Array.isArray(value)) throw new RuntimeTrap("indexed a value that is not an array", fnName)
	const element = value[index]
	if (element === undefined) throw new RuntimeTrap(`index ${index} out of range for length ${value.length}`, fnName)
	return element
}

function offsetPointer(base: Pointer, index: number, throughArray: boolean, fnName: string): Pointer {
	if (throughArray) return { kind: "pointer", cell: base.cell, path: [...base.path, index] }
	if (index === 0) return base
	// Stepping a pointer only stays valid inside the array it points into
	const last = base.path[base.path.length - 1]
	if (last === undefined) throw new RuntimeTrap(`pointer offset ${index} leaves its object`, fnName)
	return { kind: "pointer", cell: base.cell, path: [...base.path.slice(0, -1), last + index] }
}

function samePointer(a: Value, b: Value): boolean {
	if (a === null || b === null) return a === b
	if (typeof a !== "object" || typeof b !== "object" || Array.isArray(a) || Array.isArray(b)) return false
	if (a.kind === "function" || b.kind === "function") {
		return a.kind === "function" && b.kind === "function" && a.name === b.name
	}
	return a.cell === b.cell && a.path.length === b.path.length && a.path.every((p, i) => p === b.path[i])
}

// The conversions codegen emits: %d, %lld, %s and %%
function formatPrintf(format: string, args: readonly Value[], caller: string): string {
	let out = ""
	let next = 0
	for (let i = 0; i < format.length; i++) {
		const ch = format.charAt(i)
		if (ch !== "%") {
			out += ch
			continue
		}
		const directive = format.startsWith("%lld", i) ? "%lld" : format.slice(i, i + 2)
		i += directive.length - 1
		if (directive === "%%") {
			out += "%"
			continue
		}
		const arg = args[next++]
		if ((directive === "%d" || directive === "%lld") && typeof arg === "bigint") {
			out += arg.toString()
		} else if (directive === "%s" && typeof arg === "string") {
			out += arg
		} else {
			throw new RuntimeTrap(`printf: bad argument ${next} for '${directive}'`, caller)
		}
	}
	return out
}
