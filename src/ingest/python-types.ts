// Syntax tree definitions for the restricted Python subset
//
// The bridge hands over Python `ast` nodes as loose JSON objects. They are
// normalized (see python-ast.ts) into the closed unions below so that every
// consumer switches over a fixed set of kinds; anything outside the subset
// becomes an `unsupported` node that keeps its original class name.

//==============================================================================
// Operators
//==============================================================================

export type BinaryOperator =
	| "Add" | "Sub" | "Mult" | "Div" | "FloorDiv" | "Mod" | "Pow";

export type UnaryOperator = "USub" | "UAdd" | "Not";

export type BoolOperator = "And" | "Or";

export type CompareOperator = "Eq" | "NotEq" | "Lt" | "LtE" | "Gt" | "GtE";

export type NameContext = "load" | "store" | "del";

/** Python value kind of a constant, as reported by the bridge. */
export type ConstantKind = "int" | "float" | "str" | "bool";

//==============================================================================
// Expressions
//==============================================================================

interface Located {
	line?: number;
}

export interface ConstantExpr extends Located {
	kind: "constant";
	valueKind: ConstantKind;
	value: number | string | boolean;
}

export interface NameExpr extends Located {
	kind: "name";
	id: string;
	ctx: NameContext;
}

export interface AttributeExpr extends Located {
	kind: "attribute";
	value: Expr;
	attr: string;
	ctx: NameContext;
}

export interface BinOpExpr extends Located {
	kind: "binOp";
	op: BinaryOperator;
	left: Expr;
	right: Expr;
}

export interface UnaryOpExpr extends Located {
	kind: "unaryOp";
	op: UnaryOperator;
	operand: Expr;
}

export interface BoolOpExpr extends Located {
	kind: "boolOp";
	op: BoolOperator;
	values: Expr[];
}

export interface CompareExpr extends Located {
	kind: "compare";
	left: Expr;
	ops: CompareOperator[];
	comparators: Expr[];
}

export interface CallExpr extends Located {
	kind: "call";
	func: Expr;
	args: Expr[];
	keywords: string[];
}

export interface SubscriptExpr extends Located {
	kind: "subscript";
	value: Expr;
	slice: Expr;
	ctx: NameContext;
}

export interface ListExpr extends Located {
	kind: "list";
	elts: Expr[];
	ctx: NameContext;
}

export interface TupleExpr extends Located {
	kind: "tuple";
	elts: Expr[];
	ctx: NameContext;
}

/** Any expression outside the supported subset. */
export interface UnsupportedExpr extends Located {
	kind: "unsupported";
	nodeType: string;
}

export type Expr =
	| ConstantExpr | NameExpr | AttributeExpr
	| BinOpExpr | UnaryOpExpr | BoolOpExpr | CompareExpr
	| CallExpr | SubscriptExpr | ListExpr | TupleExpr
	| UnsupportedExpr;

//==============================================================================
// Statements
//==============================================================================

export interface Arg extends Located {
	name: string;
	annotation?: Expr;
}

export interface FunctionDefStmt extends Located {
	kind: "functionDef";
	name: string;
	args: Arg[];
	body: Stmt[];
}

export interface AssignStmt extends Located {
	kind: "assign";
	targets: Expr[];
	value: Expr;
}

export interface AnnAssignStmt extends Located {
	kind: "annAssign";
	target: Expr;
	annotation: Expr;
	value?: Expr;
}

export interface IfStmt extends Located {
	kind: "if";
	test: Expr;
	body: Stmt[];
	orelse: Stmt[];
}

export interface ForStmt extends Located {
	kind: "for";
	target: Expr;
	iter: Expr;
	body: Stmt[];
	orelse: Stmt[];
}

export interface ExprStmt extends Located {
	kind: "expr";
	value: Expr;
}

/** Any statement outside the supported subset. */
export interface UnsupportedStmt extends Located {
	kind: "unsupported";
	nodeType: string;
}

export type Stmt =
	| FunctionDefStmt | AssignStmt | AnnAssignStmt
	| IfStmt | ForStmt | ExprStmt
	| UnsupportedStmt;

export interface Module {
	kind: "module";
	body: Stmt[];
}

export type SyntaxNode = Module | Stmt | Expr;

//==============================================================================
// Helpers
//==============================================================================

/** Python class name of a node, for diagnostics. */
export function nodeTypeName(node: SyntaxNode): string {
	switch (node.kind) {
	case "module": return "Module";
	case "functionDef": return "FunctionDef";
	case "assign": return "Assign";
	case "annAssign": return "AnnAssign";
	case "if": return "If";
	case "for": return "For";
	case "expr": return "Expr";
	case "constant": return "Constant";
	case "name": return "Name";
	case "attribute": return "Attribute";
	case "binOp": return "BinOp";
	case "unaryOp": return "UnaryOp";
	case "boolOp": return "BoolOp";
	case "compare": return "Compare";
	case "call": return "Call";
	case "subscript": return "Subscript";
	case "list": return "List";
	case "tuple": return "Tuple";
	case "unsupported": return node.nodeType;
	}
}
