export { Lexer, lex } from "./lexer"
export { Parser, parse } from "./parser"
export { TokenKind } from "./token"
export type { Token } from "./token"
export type { Program, Stmt, Expr, Block, TypeNode, Span } from "./ast"
export type { Diagnostic, DiagnosticCode, Stage } from "./errors"
export { DiagnosticList, CodegenError, formatDiagnostic } from "./errors"
export { resolve, ENTRY_NAME } from "./resolver"
export type { Analysis, ExprInfo } from "./resolver"
export type { SymbolInfo, FunctionInfo } from "./scope"
export { codegen } from "./codegen"
export { PRINTF, CONCAT, I128_TO_STR, RUNTIME_EXTERNS, isRuntimeSymbol } from "./externs"
export type { IRModule, IRFunction, BasicBlock, Instruction, Operand, Terminator } from "./ir"
export { printModule } from "./ir-printer"
export { compile, compileOrThrow, CompileError } from "./compile"
export type { CompileOptions, CompileResult } from "./compile"
export type { Type, IntWidth } from "./types"
export { INT8, INT16, INT32, INT64, INT128, BOOL, STR, VOID, MAX_ARRAY_ELEMENTS, typeEq, typeToString } from "./types"
