/* ──────────────────────────────────────────────────────────────────────────────
   Tokens
────────────────────────────────────────────────────────────────────────────── */
export type TokenKind =
   | 'number'
   | 'string'                            // only so it can be refused
   | 'identifier'
   | 'operator'
   | 'lparen'
   | 'rparen'
   | 'lbracket'
   | 'rbracket'
   | 'lbrace'
   | 'rbrace'
   | 'comma'
   | 'dot'
   | 'colon'
   | 'eof';

export type Token = {
   kind: TokenKind;
   text: string;
   position: number;                     // 0-based offset in the formula text
};




/* ──────────────────────────────────────────────────────────────────────────────
   AST
   Only allow-listed shapes exist. List literals are not a FormulaNode: they can
   only appear as a call argument.
────────────────────────────────────────────────────────────────────────────── */
export type ArithmeticOperator = '+' | '-' | '*' | '/' | '//' | '%' | '**';
export type UnaryOperator = '+' | '-';
export type ComparisonOperator = '<' | '>' | '<=' | '>=' | '==';

export type FunctionName =
   | 'abs'
   | 'min'
   | 'max'
   | 'round'
   | 'average'
   | 'linest'
   | 'intercept'
   | 'rsq'
   | 'correl'
   | 'stdev'
   | 'stdevp'
   | 'median'
   | 'plot';

export type NumberNode = {
   kind: 'number';
   value: number;
};
export type BooleanNode = {
   kind: 'boolean';
   value: boolean;
};
export type IdentifierNode = {
   kind: 'identifier';
   name: string;
};
export type BinaryNode = {
   kind: 'binary';
   operator: ArithmeticOperator;
   left: FormulaNode;
   right: FormulaNode;
};
export type UnaryNode = {
   kind: 'unary';
   operator: UnaryOperator;
   operand: FormulaNode;
};
export type ComparisonLink = {
   operator: ComparisonOperator;
   right: FormulaNode;
};
/** `a < b <= c` holds when every link holds. */
export type ComparisonNode = {
   kind: 'comparison';
   left: FormulaNode;
   links: ComparisonLink[];
};
export type ListNode = {
   kind: 'list';
   items: FormulaNode[];
};
export type CallArgument = FormulaNode | ListNode;
export type CallNode = {
   kind: 'call';
   callee: FunctionName;
   args: CallArgument[];
};

export type FormulaNode =
   | NumberNode
   | BooleanNode
   | IdentifierNode
   | BinaryNode
   | UnaryNode
   | ComparisonNode
   | CallNode;

/** name → value available to a formula. */
export type Bindings = Readonly<Record<string, number>>;

export type PlotSeries<T> = {
   x: T[];
   y: T[];
};
