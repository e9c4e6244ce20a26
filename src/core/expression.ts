/**
 * Expression Language for constructed rules
 *
 * A small Jinja-like expression subset evaluated against host variables:
 *
 *   user_attributes.role == 'web' and state in ['active', 'poweroff']
 *   'vm_' ~ id
 *   not user_attributes['backup']
 */

/**
 * Error raised for syntax errors and undefined variables
 */
export class ExpressionError extends Error {
  constructor(message: string, public readonly expression: string) {
    super(message);
    this.name = 'ExpressionError';
  }
}

/**
 * Values an expression can produce
 */
export type ExpressionValue =
  | string
  | number
  | boolean
  | null
  | ExpressionValue[]
  | { [key: string]: ExpressionValue };

// =============================================================================
// Tokenizer
// =============================================================================

type Token =
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'name'; value: string }
  | { type: 'op'; value: string }
  | { type: 'end' };

const OPERATORS = ['==', '!=', '~', '.', '[', ']', '(', ')', ','];

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const char = source.charAt(i);

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (char === '"' || char === "'") {
      let value = '';
      i++;
      while (i < source.length && source.charAt(i) !== char) {
        if (source.charAt(i) === '\\' && i + 1 < source.length) {
          i++;
        }
        value += source.charAt(i);
        i++;
      }
      if (i >= source.length) {
        throw new ExpressionError('Unterminated string literal', source);
      }
      i++;
      tokens.push({ type: 'string', value });
      continue;
    }

    const number = /^-?\d+(\.\d+)?/.exec(source.slice(i));
    if (number && (char !== '-' || tokens.length === 0 || tokens[tokens.length - 1]?.type === 'op')) {
      tokens.push({ type: 'number', value: Number(number[0]) });
      i += number[0].length;
      continue;
    }

    const name = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(i));
    if (name) {
      tokens.push({ type: 'name', value: name[0] });
      i += name[0].length;
      continue;
    }

    const operator = OPERATORS.find((op) => source.startsWith(op, i));
    if (operator) {
      tokens.push({ type: 'op', value: operator });
      i += operator.length;
      continue;
    }

    throw new ExpressionError(`Unexpected character '${char}' at position ${i}`, source);
  }

  tokens.push({ type: 'end' });
  return tokens;
}

// =============================================================================
// Parser
// =============================================================================

type Node =
  | { kind: 'literal'; value: ExpressionValue }
  | { kind: 'list'; items: Node[] }
  | { kind: 'variable'; name: string }
  | { kind: 'member'; target: Node; key: Node }
  | { kind: 'not'; operand: Node }
  | { kind: 'binary'; operator: 'and' | 'or' | '==' | '!=' | 'in' | 'not in' | '~'; left: Node; right: Node };

const KEYWORD_LITERALS: Record<string, ExpressionValue> = {
  true: true,
  True: true,
  false: false,
  False: false,
  none: null,
  None: null,
  null: null,
};

class Parser {
  private position = 0;

  constructor(private readonly tokens: Token[], private readonly source: string) {}

  parse(): Node {
    const node = this.parseOr();
    if (this.peek().type !== 'end') {
      throw this.error('Unexpected trailing input');
    }
    return node;
  }

  private peek(offset = 0): Token {
    return this.tokens[this.position + offset] ?? { type: 'end' };
  }

  private next(): Token {
    const token = this.peek();
    this.position++;
    return token;
  }

  private isKeyword(word: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.type === 'name' && token.value === word;
  }

  private isOp(op: string): boolean {
    const token = this.peek();
    return token.type === 'op' && token.value === op;
  }

  private expectOp(op: string): void {
    if (!this.isOp(op)) {
      throw this.error(`Expected '${op}'`);
    }
    this.position++;
  }

  private error(message: string): ExpressionError {
    return new ExpressionError(`${message} in expression: ${this.source}`, this.source);
  }

  private parseOr(): Node {
    let left = this.parseAnd();
    while (this.isKeyword('or')) {
      this.position++;
      left = { kind: 'binary', operator: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Node {
    let left = this.parseNot();
    while (this.isKeyword('and')) {
      this.position++;
      left = { kind: 'binary', operator: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): Node {
    if (this.isKeyword('not')) {
      this.position++;
      return { kind: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Node {
    const left = this.parseConcat();

    if (this.isOp('==') || this.isOp('!=')) {
      const token = this.next();
      const operator = token.type === 'op' && token.value === '==' ? '==' : '!=';
      return { kind: 'binary', operator, left, right: this.parseConcat() };
    }
    if (this.isKeyword('in')) {
      this.position++;
      return { kind: 'binary', operator: 'in', left, right: this.parseConcat() };
    }
    if (this.isKeyword('not') && this.isKeyword('in', 1)) {
      this.position += 2;
      return { kind: 'binary', operator: 'not in', left, right: this.parseConcat() };
    }
    return left;
  }

  private parseConcat(): Node {
    let left = this.parsePostfix();
    while (this.isOp('~')) {
      this.position++;
      left = { kind: 'binary', operator: '~', left, right: this.parsePostfix() };
    }
    return left;
  }

  private parsePostfix(): Node {
    let node = this.parsePrimary();

    for (;;) {
      if (this.isOp('.')) {
        this.position++;
        const token = this.next();
        if (token.type === 'name') {
          node = { kind: 'member', target: node, key: { kind: 'literal', value: token.value } };
        } else if (token.type === 'number' && Number.isInteger(token.value)) {
          node = { kind: 'member', target: node, key: { kind: 'literal', value: token.value } };
        } else {
          throw this.error("Expected attribute name after '.'");
        }
      } else if (this.isOp('[')) {
        this.position++;
        const key = this.parseOr();
        this.expectOp(']');
        node = { kind: 'member', target: node, key };
      } else {
        return node;
      }
    }
  }

  private parsePrimary(): Node {
    const token = this.next();

    switch (token.type) {
      case 'string':
      case 'number':
        return { kind: 'literal', value: token.value };
      case 'name':
        if (Object.prototype.hasOwnProperty.call(KEYWORD_LITERALS, token.value)) {
          return { kind: 'literal', value: KEYWORD_LITERALS[token.value] ?? null };
        }
        return { kind: 'variable', name: token.value };
      case 'op':
        if (token.value === '(') {
          const inner = this.parseOr();
          this.expectOp(')');
          return inner;
        }
        if (token.value === '[') {
          const items: Node[] = [];
          if (!this.isOp(']')) {
            items.push(this.parseOr());
            while (this.isOp(',')) {
              this.position++;
              if (this.isOp(']')) break;
              items.push(this.parseOr());
            }
          }
          this.expectOp(']');
          return { kind: 'list', items };
        }
        throw this.error(`Unexpected '${token.value}'`);
      case 'end':
        throw this.error('Unexpected end of expression');
    }
  }
}

// =============================================================================
// Evaluation
// =============================================================================

function isMapping(value: ExpressionValue): value is { [key: string]: ExpressionValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Jinja-style truthiness: empty strings, lists and mappings, zero and
 * null are false.
 */
export function isTruthy(value: ExpressionValue): boolean {
  if (value === null) return false;
  if (typeof value === 'string') return value.length > 0;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.length > 0;
  return Object.keys(value).length > 0;
}

function equals(left: ExpressionValue, right: ExpressionValue): boolean {
  if (typeof left !== 'object' || typeof right !== 'object' || left === null || right === null) {
    return left === right;
  }
  return JSON.stringify(left) === JSON.stringify(right);
}

/**
 * Render a value the way string concatenation sees it.
 */
export function stringify(value: ExpressionValue): string {
  if (value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Convert an arbitrary host variable into an ExpressionValue.
 */
export function toExpressionValue(value: unknown): ExpressionValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(toExpressionValue);
  if (typeof value === 'object') {
    const result: { [key: string]: ExpressionValue } = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toExpressionValue(item);
    }
    return result;
  }
  return String(value);
}

/**
 * A parsed expression that can be evaluated against many hosts.
 */
export class Expression {
  private readonly root: Node;

  constructor(public readonly source: string) {
    this.root = new Parser(tokenize(source), source).parse();
  }

  /**
   * Evaluate the expression.
   *
   * @param variables - Host variables in scope
   * @throws ExpressionError for undefined variables or attributes
   */
  evaluate(variables: Record<string, unknown>): ExpressionValue {
    return this.evaluateNode(this.root, variables);
  }

  private evaluateNode(node: Node, variables: Record<string, unknown>): ExpressionValue {
    switch (node.kind) {
      case 'literal':
        return node.value;
      case 'list':
        return node.items.map((item) => this.evaluateNode(item, variables));
      case 'variable':
        if (!Object.prototype.hasOwnProperty.call(variables, node.name)) {
          throw new ExpressionError(`'${node.name}' is undefined`, this.source);
        }
        return toExpressionValue(variables[node.name]);
      case 'member':
        return this.member(
          this.evaluateNode(node.target, variables),
          this.evaluateNode(node.key, variables)
        );
      case 'not':
        return !isTruthy(this.evaluateNode(node.operand, variables));
      case 'binary':
        return this.binary(node.operator, node.left, node.right, variables);
    }
  }

  private member(target: ExpressionValue, key: ExpressionValue): ExpressionValue {
    if (Array.isArray(target) && typeof key === 'number') {
      const index = key < 0 ? target.length + key : key;
      const item = target[index];
      if (item === undefined) {
        throw new ExpressionError(`list index ${key} out of range`, this.source);
      }
      return item;
    }
    if (isMapping(target) && (typeof key === 'string' || typeof key === 'number')) {
      const name = String(key);
      if (!Object.prototype.hasOwnProperty.call(target, name)) {
        throw new ExpressionError(`object has no attribute '${name}'`, this.source);
      }
      return target[name] ?? null;
    }
    throw new ExpressionError(`cannot read '${stringify(key)}' of ${stringify(target) || 'null'}`, this.source);
  }

  private binary(
    operator: 'and' | 'or' | '==' | '!=' | 'in' | 'not in' | '~',
    leftNode: Node,
    rightNode: Node,
    variables: Record<string, unknown>
  ): ExpressionValue {
    const left = this.evaluateNode(leftNode, variables);

    // Short-circuit and return the deciding operand, as Jinja does
    if (operator === 'and') {
      return isTruthy(left) ? this.evaluateNode(rightNode, variables) : left;
    }
    if (operator === 'or') {
      return isTruthy(left) ? left : this.evaluateNode(rightNode, variables);
    }

    const right = this.evaluateNode(rightNode, variables);
    switch (operator) {
      case '==':
        return equals(left, right);
      case '!=':
        return !equals(left, right);
      case '~':
        return stringify(left) + stringify(right);
      case 'in':
        return this.contains(right, left);
      case 'not in':
        return !this.contains(right, left);
    }
  }

  private contains(container: ExpressionValue, item: ExpressionValue): boolean {
    if (typeof container === 'string') {
      return typeof item === 'string' && container.includes(item);
    }
    if (Array.isArray(container)) {
      return container.some((candidate) => equals(candidate, item));
    }
    if (isMapping(container)) {
      return (typeof item === 'string' || typeof item === 'number') &&
        Object.prototype.hasOwnProperty.call(container, String(item));
    }
    throw new ExpressionError(`argument of type ${container === null ? 'null' : typeof container} is not iterable`, this.source);
  }
}

const compiled = new Map<string, Expression>();

/**
 * Parse an expression, reusing earlier parses of the same source.
 *
 * @throws ExpressionError on syntax errors
 */
export function compileExpression(source: string): Expression {
  let expression = compiled.get(source);
  if (!expression) {
    expression = new Expression(source);
    compiled.set(source, expression);
  }
  return expression;
}
