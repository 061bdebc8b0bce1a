#!/usr/bin/env tsx
/**
 * Compile a tpl source file through the full pipeline: lex → parse → resolve → codegen.
 *
 * Usage:
 *   tsx scripts/compile.ts <input.tpl> [output] [--run]
 *
 * Without `output` the IR is printed; with it the IR is written to `<output>.ll`.
 * `--run` executes the module with the reference interpreter.
 */
import { readFileSync, writeFileSync } from "node:fs"
import { compile, formatDiagnostic, printModule } from "../src/compiler"
import { execute } from "../src/runtime"

const args = process.argv.slice(2)
const run = args.includes("--run")
const [inputPath, outputPath] = args.filter((a) => a !== "--run")

if (!inputPath) {
	console.error("Usage: compile.ts <input.tpl> [output] [--run]")
	process.exit(2)
}

let source: string
try {
	source = readFileSync(inputPath, "utf-8")
} catch (e) {
	console.error(`Cannot read ${inputPath}: ${e instanceof Error ? e.message : String(e)}`)
	process.exit(2)
}

const result = compile(source, inputPath)
if (!result.success) {
	for (const d of result.diagnostics) {
		console.error(formatDiagnostic(d, inputPath))
	}
	console.error(`${result.diagnostics.length} error(s)`)
	process.exit(1)
}

const ir = printModule(result.module)
if (outputPath) {
	const target = outputPath.endsWith(".ll") ? outputPath : `${outputPath}.ll`
	writeFileSync(target, ir)
	console.log(`Wrote ${target}`)
} else if (!run) {
	process.stdout.write(ir)
}

if (run) {
	const execution = execute(result.module)
	process.stdout.write(execution.output)
	if (execution.trap) {
		console.error(`Trap in ${execution.trap.functionName}: ${execution.trap.message}`)
	}
	process.exit(execution.exitCode)
}
