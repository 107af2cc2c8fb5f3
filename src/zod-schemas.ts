// IRSim Zod Schemas
// Single source of truth for the serializable program AST and interpreter options.
//
// AST interfaces are written out by hand rather than inferred, because the
// statement and expression unions are mutually recursive; recursive schemas
// are annotated with z.ZodType<ExplicitType> and use getters for laziness.

import { z } from "zod/v4";

//==============================================================================
// Expression Domain - Manual Interfaces
//==============================================================================

export type LiteralKind = "number" | "boolean" | "string";

export interface Literal { kind: "literal"; literalKind: LiteralKind; value: string }
export interface Identifier { kind: "identifier"; name: string }
export interface FunctionCall { kind: "call"; name: string; args: Expression[] }

export type Expression = Literal | Identifier | FunctionCall;

//==============================================================================
// Statement Domain - Manual Interfaces
//==============================================================================

export interface Block { kind: "block"; statements: Statement[] }
export interface ExpressionStatement { kind: "expression"; expression: Expression }
export interface Assignment { kind: "assignment"; targets: string[]; value: Expression }
export interface VariableDeclaration { kind: "variableDeclaration"; names: string[]; value?: Expression | undefined }
export interface If { kind: "if"; condition: Expression; body: Block }
export interface Case { value?: Literal | undefined; body: Block }
export interface Switch { kind: "switch"; expression: Expression; cases: Case[] }
export interface FunctionDefinition { kind: "functionDefinition"; name: string; params: string[]; returns: string[]; body: Block }
export interface ForLoop { kind: "for"; pre: Block; condition: Expression; post: Block; body: Block }
export interface Break { kind: "break" }
export interface Continue { kind: "continue" }
export interface Leave { kind: "leave" }

export type Statement =
	| ExpressionStatement | Assignment | VariableDeclaration
	| If | Switch | FunctionDefinition | ForLoop
	| Break | Continue | Leave | Block;

//==============================================================================
// Zod Schemas - Expressions
//==============================================================================

const Name = z.string().min(1);

export const LiteralSchema = z.object({
	kind: z.literal("literal"),
	literalKind: z.enum(["number", "boolean", "string"]),
	value: z.string(),
}).meta({ id: "Literal", title: "Literal", description: "Number, boolean or short string constant" });

export const IdentifierSchema = z.object({
	kind: z.literal("identifier"),
	name: Name,
}).meta({ id: "Identifier", title: "Identifier", description: "Reference to a variable of the current function activation" });

export const FunctionCallSchema: z.ZodType<FunctionCall> = z.object({
	kind: z.literal("call"),
	name: Name,
	get args() { return z.array(ExpressionSchema); },
}).meta({ id: "FunctionCall", title: "Function Call", description: "Call of a builtin or user-defined function" });

export const ExpressionSchema: z.ZodType<Expression> = z.union([
	LiteralSchema,
	IdentifierSchema,
	FunctionCallSchema,
]).meta({ id: "Expression", title: "Expression", description: "Union of all expression variants" });

//==============================================================================
// Zod Schemas - Statements
//==============================================================================

export const BlockSchema: z.ZodType<Block> = z.object({
	kind: z.literal("block"),
	get statements() { return z.array(StatementSchema); },
}).meta({ id: "Block", title: "Block", description: "Sequence of statements opening a lexical scope" });

export const ExpressionStatementSchema = z.object({
	kind: z.literal("expression"),
	expression: ExpressionSchema,
}).meta({ id: "ExpressionStatement", title: "Expression Statement", description: "Expression evaluated for its side effects" });

export const AssignmentSchema = z.object({
	kind: z.literal("assignment"),
	targets: z.array(Name).min(1),
	value: ExpressionSchema,
}).meta({ id: "Assignment", title: "Assignment", description: "Overwrite one or more bound variables" });

export const VariableDeclarationSchema = z.object({
	kind: z.literal("variableDeclaration"),
	names: z.array(Name).min(1),
	value: ExpressionSchema.optional(),
}).meta({ id: "VariableDeclaration", title: "Variable Declaration", description: "Declare block-scoped variables, zero-initialised without a value" });

export const IfSchema: z.ZodType<If> = z.object({
	kind: z.literal("if"),
	condition: ExpressionSchema,
	get body() { return BlockSchema; },
}).meta({ id: "If", title: "If", description: "Run the body when the condition is non-zero" });

export const CaseSchema: z.ZodType<Case> = z.object({
	value: LiteralSchema.optional(),
	get body() { return BlockSchema; },
}).meta({ id: "Case", title: "Switch Case", description: "Case with a literal, or the default case without one" });

export const SwitchSchema: z.ZodType<Switch> = z.object({
	kind: z.literal("switch"),
	expression: ExpressionSchema,
	get cases() { return z.array(CaseSchema).min(1); },
}).meta({ id: "Switch", title: "Switch", description: "Run the first matching case" });

export const FunctionDefinitionSchema: z.ZodType<FunctionDefinition> = z.object({
	kind: z.literal("functionDefinition"),
	name: Name,
	params: z.array(Name),
	returns: z.array(Name),
	get body() { return BlockSchema; },
}).meta({ id: "FunctionDefinition", title: "Function Definition", description: "Named function visible throughout its enclosing block" });

export const ForLoopSchema: z.ZodType<ForLoop> = z.object({
	kind: z.literal("for"),
	get pre() { return BlockSchema; },
	condition: ExpressionSchema,
	get post() { return BlockSchema; },
	get body() { return BlockSchema; },
}).meta({ id: "ForLoop", title: "For Loop", description: "Loop with init, condition, post and body blocks" });

export const BreakSchema = z.object({ kind: z.literal("break") }).meta({ id: "Break", title: "Break", description: "Exit the innermost loop" });
export const ContinueSchema = z.object({ kind: z.literal("continue") }).meta({ id: "Continue", title: "Continue", description: "Skip to the post block of the innermost loop" });
export const LeaveSchema = z.object({ kind: z.literal("leave") }).meta({ id: "Leave", title: "Leave", description: "Return from the current function" });

export const StatementSchema: z.ZodType<Statement> = z.union([
	ExpressionStatementSchema,
	AssignmentSchema,
	VariableDeclarationSchema,
	IfSchema,
	SwitchSchema,
	FunctionDefinitionSchema,
	ForLoopSchema,
	BreakSchema,
	ContinueSchema,
	LeaveSchema,
	BlockSchema,
]).meta({ id: "Statement", title: "Statement", description: "Union of all statement variants" });

//==============================================================================
// Zod Schemas - Interpreter Options
//==============================================================================

const HexBytes = z.string().regex(/^(0x)?([0-9a-fA-F]{2})*$/);

/** Non-negative integer given as a number, or a decimal/hex string for values past 2^53. */
const WordInput = z.union([
	z.number().int().nonnegative(),
	z.string().regex(/^(0x[0-9a-fA-F]+|[0-9]+)$/),
]);

export const InterpreterOptionsSchema = z.object({
	maxSteps: z.number().int().nonnegative().optional(),
	maxExprNesting: z.number().int().nonnegative().optional(),
	dialect: z.enum(["evm", "wasm"]).optional(),
	calldata: HexBytes.optional(),
	address: WordInput.optional(),
	caller: WordInput.optional(),
	callvalue: WordInput.optional(),
	dataObjects: z.array(z.object({ name: Name, data: HexBytes })).optional(),
	verbose: z.boolean().optional(),
}).meta({ id: "InterpreterOptions", title: "Interpreter Options", description: "Limits, active dialect and environment of one run" });

export type InterpreterOptions = z.infer<typeof InterpreterOptionsSchema>;
