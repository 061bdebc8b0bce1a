import type { Span } from "./ast"
import { CodegenError } from "./errors"
import type {
	BasicBlock,
	BinaryOpcode,
	CastOpcode,
	ExternDecl,
	GlobalString,
	IRFunction,
	IRModule,
	IcmpPredicate,
	Instruction,
	LocalDecl,
	Operand,
	Reg,
	Terminator,
} from "./ir"
import { BOOL, STR, type Type, functionType, pointerTo } from "./types"

/** Collects module-level pieces: interned string constants, externs, finished functions. */
export class ModuleBuilder {
	private globals: GlobalString[] = []
	private globalsByValue = new Map<string, string>()
	private externs = new Map<string, ExternDecl>()
	private functions: IRFunction[] = []

	/** Interns a string constant and returns its address. */
	stringConstant(value: string): Operand {
		let name = this.globalsByValue.get(value)
		if (name === undefined) {
			name = `.str.${this.globals.length}`
			this.globals.push({ name, value })
			this.globalsByValue.set(value, name)
		}
		return { kind: "global", name, type: STR }
	}

	/** Declares an external function on first use and returns a reference to it. */
	useExtern(decl: ExternDecl): Operand {
		if (!this.externs.has(decl.name)) {
			this.externs.set(decl.name, decl)
		}
		return { kind: "func", name: decl.name, type: functionType(decl.params, decl.returnType) }
	}

	addFunction(fn: IRFunction): void {
		this.functions.push(fn)
	}

	build(name: string, sourcePath: string): IRModule {
		return {
			name,
			sourcePath,
			globals: this.globals,
			externs: [...this.externs.values()],
			functions: this.functions,
		}
	}
}

interface PendingBlock {
	readonly label: string
	readonly instructions: Instruction[]
	terminator: Terminator | null
}

/**
 * Builds one function block by block. Register ids and block labels are
 * numbered per function, so output does not depend on what else was compiled.
 */
export class FunctionBuilder {
	readonly name: string
	readonly returnType: Type
	readonly params: Reg[]
	private span: Span
	private nextReg = 0
	private nextLabel = 0
	private blocks: PendingBlock[] = []
	private current: PendingBlock
	private locals: LocalDecl[] = []
	// Slots are reserved at the top of the entry block, ahead of any other instruction
	private allocaCount = 0
	private localNames = new Set<string>()

	constructor(name: string, paramTypes: readonly Type[], returnType: Type, span: Span) {
		this.name = name
		this.returnType = returnType
		this.span = span
		this.params = paramTypes.map((t) => this.newReg(t))
		this.current = { label: "entry", instructions: [], terminator: null }
		this.blocks.push(this.current)
	}

	// --- Blocks ---

	/** Creates an empty block; it is laid out in creation order. */
	newBlock(base: string): string {
		const label = `${base}.${this.nextLabel++}`
		this.blocks.push({ label, instructions: [], terminator: null })
		return label
	}

	switchTo(label: string): void {
		const block = this.blocks.find((b) => b.label === label)
		if (!block) {
			throw new CodegenError(`block '${label}' not found in '${this.name}'`, this.span)
		}
		this.current = block
	}

	get isTerminated(): boolean {
		return this.current.terminator !== null
	}

	// Code after a return or break lands in a fresh block that nothing branches to
	private ensureOpen(): PendingBlock {
		if (this.current.terminator !== null) {
			this.switchTo(this.newBlock("dead"))
		}
		return this.current
	}

	// --- Locals ---

	/** Declares a register-resident local, renaming on clashes (`x`, `x.1`, ...). */
	declareLocal(base: string, type: Type): string {
		let name = base
		for (let n = 1; this.localNames.has(name); n++) {
			name = `${base}.${n}`
		}
		this.localNames.add(name)
		this.locals.push({ name, type })
		return name
	}

	// --- Instructions ---

	private newReg(type: Type): Reg {
		return { kind: "reg", id: this.nextReg++, type }
	}

	private emit(inst: Instruction): void {
		this.ensureOpen().instructions.push(inst)
	}

	/** Reserves a slot in the entry block, so it exists once per call whatever block asks for it. */
	alloca(allocated: Type): Reg {
		const dest = this.newReg(pointerTo(allocated))
		const [entry] = this.blocks
		if (!entry) throw new CodegenError(`'${this.name}' has no entry block`, this.span)
		entry.instructions.splice(this.allocaCount++, 0, { kind: "alloca", dest, allocated })
		return dest
	}

	load(ptr: Operand, type: Type): Reg {
		const dest = this.newReg(type)
		this.emit({ kind: "load", dest, ptr })
		return dest
	}

	store(ptr: Operand, value: Operand): void {
		this.emit({ kind: "store", ptr, value })
	}

	localGet(local: string, type: Type): Reg {
		const dest = this.newReg(type)
		this.emit({ kind: "local.get", dest, local })
		return dest
	}

	localSet(local: string, value: Operand): void {
		this.emit({ kind: "local.set", local, value })
	}

	binary(op: BinaryOpcode, lhs: Operand, rhs: Operand): Reg {
		const dest = this.newReg(lhs.type)
		this.emit({ kind: "binary", op, dest, lhs, rhs })
		return dest
	}

	icmp(pred: IcmpPredicate, lhs: Operand, rhs: Operand): Reg {
		const dest = this.newReg(BOOL)
		this.emit({ kind: "icmp", pred, dest, lhs, rhs })
		return dest
	}

	not(operand: Operand): Reg {
		const dest = this.newReg(BOOL)
		this.emit({ kind: "not", dest, operand })
		return dest
	}

	cast(op: CastOpcode, value: Operand, type: Type): Reg {
		const dest = this.newReg(type)
		this.emit({ kind: "cast", op, dest, value })
		return dest
	}

	elementPtr(base: Operand, index: Operand, elementType: Type, throughArray: boolean): Reg {
		const dest = this.newReg(pointerTo(elementType))
		this.emit({ kind: "gep", dest, base, index, throughArray })
		return dest
	}

	select(cond: Operand, ifTrue: Operand, ifFalse: Operand): Reg {
		const dest = this.newReg(ifTrue.type)
		this.emit({ kind: "select", dest, cond, ifTrue, ifFalse })
		return dest
	}

	/** Returns the result register, or null for a void callee. */
	call(callee: Operand, args: readonly Operand[], returnType: Type): Reg | null {
		const dest = returnType.kind === "void" ? null : this.newReg(returnType)
		this.emit({ kind: "call", dest, callee, args })
		return dest
	}

	// --- Terminators ---

	private terminate(terminator: Terminator): void {
		this.ensureOpen().terminator = terminator
	}

	br(target: string): void {
		this.terminate({ kind: "br", target })
	}

	/** Branches to `target` unless the current block already ended. */
	fallThrough(target: string): void {
		if (!this.isTerminated) this.br(target)
	}

	condBr(cond: Operand, ifTrue: string, ifFalse: string): void {
		this.terminate({ kind: "condbr", cond, ifTrue, ifFalse })
	}

	ret(value: Operand | null): void {
		this.terminate({ kind: "ret", value })
	}

	unreachable(): void {
		this.terminate({ kind: "unreachable" })
	}

	build(): IRFunction {
		const blocks: BasicBlock[] = this.blocks.map((b) => {
			if (b.terminator === null) {
				throw new CodegenError(`block '${b.label}' in '${this.name}' has no terminator`, this.span)
			}
			return { label: b.label, instructions: b.instructions, terminator: b.terminator }
		})
		return {
			name: this.name,
			params: this.params,
			returnType: this.returnType,
			locals: this.locals,
			blocks,
		}
	}
}
