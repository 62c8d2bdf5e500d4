/**
 * Allow-list grammar for generated SQL.
 *
 * A recursive-descent parser over the lexer's tokens that accepts one plain
 * SELECT over a single descriptor table, with WHERE / GROUP BY / HAVING /
 * ORDER BY / LIMIT, scalar functions from a fixed list, and subqueries only
 * as IN / EXISTS / scalar operands. Everything else is rejected.
 *
 * Identifiers are collected while parsing and resolved against the schema
 * descriptor once the whole statement is read, so correlated subqueries can
 * see tables of the enclosing query.
 */

import { unknownReference, unsafeStatement, type PipelineError } from '../errors.js';
import {
  findColumn,
  findTable,
  type SchemaDescriptor,
  type TableDescriptor,
} from '../schema/descriptor.js';
import type { Token } from './lexer.js';

const KEYWORDS = new Set([
  'SELECT', 'DISTINCT', 'ALL', 'FROM', 'WHERE', 'GROUP', 'BY', 'HAVING', 'ORDER', 'ASC', 'DESC',
  'LIMIT', 'OFFSET', 'AS', 'AND', 'OR', 'NOT', 'IN', 'LIKE', 'GLOB', 'REGEXP', 'MATCH', 'ESCAPE',
  'BETWEEN', 'IS', 'ISNULL', 'NOTNULL', 'NULL', 'TRUE', 'FALSE', 'CASE', 'WHEN', 'THEN', 'ELSE',
  'END', 'EXISTS', 'JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'OUTER', 'CROSS', 'NATURAL', 'ON',
  'USING', 'UNION', 'INTERSECT', 'EXCEPT', 'WITH', 'COLLATE', 'CAST', 'WINDOW', 'OVER', 'FILTER',
  'INDEXED', 'NULLS', 'FIRST', 'LAST', 'VALUES', 'RAISE',
]);

const JOIN_KEYWORDS = new Set(['JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'OUTER', 'CROSS', 'NATURAL']);
const COMPOUND_KEYWORDS = new Set(['UNION', 'INTERSECT', 'EXCEPT']);

const AGGREGATE_FUNCTIONS = new Set(['COUNT', 'SUM', 'AVG', 'MIN', 'MAX', 'TOTAL']);
const SCALAR_FUNCTIONS = new Set([
  'LOWER', 'UPPER', 'LENGTH', 'TRIM', 'LTRIM', 'RTRIM', 'SUBSTR', 'SUBSTRING', 'INSTR',
  'ABS', 'ROUND', 'COALESCE', 'IFNULL', 'NULLIF',
]);

const COMPARISON_OPS = new Set(['=', '==', '!=', '<>', '<', '<=', '>', '>=']);

type Clause = 'select' | 'where' | 'group' | 'having' | 'order';

interface ColumnUse {
  qualifier?: string;
  column: string;
  clause: Clause;
}

interface QueryScope {
  parent?: QueryScope;
  /** Keyed by lower-cased alias, or table name when unaliased */
  tables: Map<string, TableDescriptor>;
  /** Lower-cased select-list aliases */
  outputAliases: Set<string>;
  uses: ColumnUse[];
  clause: Clause;
}

export interface GrammarResult {
  /** Descriptor table names referenced, in first-seen order */
  tables: string[];
  /** Referenced columns as "table.column", in first-seen order */
  columns: string[];
}

export function checkGrammar(tokens: Token[], schema: SchemaDescriptor, sql: string): GrammarResult {
  return new AllowListParser(tokens, schema, sql).parse();
}

class AllowListParser {
  private pos = 0;
  private current: QueryScope | undefined;
  private readonly scopes: QueryScope[] = [];
  private readonly tables = new Set<string>();
  private readonly columns = new Set<string>();

  constructor(
    private readonly tokens: Token[],
    private readonly schema: SchemaDescriptor,
    private readonly sql: string,
  ) {}

  parse(): GrammarResult {
    this.parseQuery();
    if (this.peek().type !== 'eof') {
      throw this.unexpected();
    }
    for (const scope of this.scopes) {
      this.resolve(scope);
    }
    return { tables: [...this.tables], columns: [...this.columns] };
  }

  // ── Query structure ──────────────────────────────────────────────

  private parseQuery(): void {
    const scope: QueryScope = {
      parent: this.current,
      tables: new Map(),
      outputAliases: new Set(),
      uses: [],
      clause: 'select',
    };
    this.scopes.push(scope);
    const enclosing = this.current;
    this.current = scope;

    this.expectKeyword('SELECT');
    if (!this.matchKeyword('DISTINCT')) {
      this.matchKeyword('ALL');
    }
    this.parseSelectItems(scope);

    this.expectKeyword('FROM');
    this.parseTableRef(scope);

    if (this.isPunct(',') || this.isKeywordIn(JOIN_KEYWORDS)) {
      throw this.reject('Only one table may appear in FROM; joins are not allowed.');
    }

    if (this.matchKeyword('WHERE')) {
      scope.clause = 'where';
      this.parseExpr();
    }

    if (this.matchKeyword('GROUP')) {
      this.expectKeyword('BY');
      scope.clause = 'group';
      this.parseExprList();
      if (this.matchKeyword('HAVING')) {
        scope.clause = 'having';
        this.parseExpr();
      }
    }

    if (this.matchKeyword('ORDER')) {
      this.expectKeyword('BY');
      scope.clause = 'order';
      do {
        this.parseExpr();
        if (!this.matchKeyword('ASC')) {
          this.matchKeyword('DESC');
        }
      } while (this.matchPunct(','));
    }

    if (this.matchKeyword('LIMIT')) {
      this.expectInteger();
      if (this.matchKeyword('OFFSET')) {
        this.expectInteger();
      }
    }

    if (this.isKeywordIn(COMPOUND_KEYWORDS)) {
      throw this.reject('Compound SELECT statements (UNION, INTERSECT, EXCEPT) are not allowed.');
    }

    this.current = enclosing;
  }

  private parseSelectItems(scope: QueryScope): void {
    do {
      if (this.isOp('*')) {
        this.advance();
        continue;
      }

      if (this.isName(this.peek()) && this.isPunctAt(1, '.') && this.isOpAt(2, '*')) {
        const qualifier = this.advance().value;
        this.advance();
        this.advance();
        this.use(qualifier, '*');
        continue;
      }

      this.parseExpr();

      if (this.matchKeyword('AS')) {
        scope.outputAliases.add(this.expectName('alias').toLowerCase());
      } else if (this.isName(this.peek())) {
        scope.outputAliases.add(this.advance().value.toLowerCase());
      }
    } while (this.matchPunct(','));
  }

  private parseTableRef(scope: QueryScope): void {
    if (this.isPunct('(')) {
      throw this.reject('Subqueries in FROM are not allowed.');
    }
    const name = this.expectName('table name');
    if (this.isPunct('.')) {
      throw this.reject('Schema-qualified table names are not allowed.');
    }
    if (this.isPunct('(')) {
      throw this.reject('Table-valued functions are not allowed.');
    }

    const table = findTable(this.schema, name);
    if (!table) {
      throw unknownReference(`Unknown table "${name}".`, { sql: this.sql, table: name });
    }
    this.tables.add(table.name);

    let alias: string | undefined;
    if (this.matchKeyword('AS')) {
      alias = this.expectName('table alias');
    } else if (this.isName(this.peek())) {
      alias = this.advance().value;
    }
    scope.tables.set((alias ?? table.name).toLowerCase(), table);
  }

  // ── Expressions ──────────────────────────────────────────────────

  private parseExprList(): void {
    do {
      this.parseExpr();
    } while (this.matchPunct(','));
  }

  private parseExpr(): void {
    this.parseAnd();
    while (this.matchKeyword('OR')) {
      this.parseAnd();
    }
  }

  private parseAnd(): void {
    this.parseNot();
    while (this.matchKeyword('AND')) {
      this.parseNot();
    }
  }

  private parseNot(): void {
    if (this.matchKeyword('NOT')) {
      this.parseNot();
      return;
    }
    this.parseComparison();
  }

  private parseComparison(): void {
    this.parseSum();

    const tok = this.peek();
    if (tok.type === 'op' && COMPARISON_OPS.has(tok.value)) {
      this.advance();
      this.parseSum();
      return;
    }

    const negated = this.matchKeyword('NOT');

    if (this.matchKeyword('IN')) {
      this.expectPunct('(');
      if (this.isKeyword('SELECT')) {
        this.parseQuery();
      } else {
        this.parseExprList();
      }
      this.expectPunct(')');
      return;
    }

    if (this.matchKeyword('LIKE')) {
      this.parseSum();
      if (this.matchKeyword('ESCAPE')) {
        this.expectString();
      }
      return;
    }

    if (this.matchKeyword('BETWEEN')) {
      this.parseSum();
      this.expectKeyword('AND');
      this.parseSum();
      return;
    }

    if (negated) {
      throw this.unexpected();
    }

    if (this.matchKeyword('IS')) {
      this.matchKeyword('NOT');
      this.expectKeyword('NULL');
    }
  }

  private parseSum(): void {
    this.parseProduct();
    while (this.isOp('+') || this.isOp('-') || this.isOp('||')) {
      this.advance();
      this.parseProduct();
    }
  }

  private parseProduct(): void {
    this.parseUnary();
    while (this.isOp('*') || this.isOp('/') || this.isOp('%')) {
      this.advance();
      this.parseUnary();
    }
  }

  private parseUnary(): void {
    if (this.isOp('-') || this.isOp('+')) {
      this.advance();
      this.parseUnary();
      return;
    }
    this.parsePrimary();
  }

  private parsePrimary(): void {
    const tok = this.peek();

    if (tok.type === 'number' || tok.type === 'string') {
      this.advance();
      return;
    }

    if (this.matchKeyword('NULL') || this.matchKeyword('TRUE') || this.matchKeyword('FALSE')) {
      return;
    }

    if (this.matchKeyword('CASE')) {
      this.parseCase();
      return;
    }

    if (this.matchKeyword('EXISTS')) {
      this.expectPunct('(');
      this.parseQuery();
      this.expectPunct(')');
      return;
    }

    if (this.matchPunct('(')) {
      if (this.isKeyword('SELECT')) {
        this.parseQuery();
      } else {
        this.parseExpr();
      }
      this.expectPunct(')');
      return;
    }

    if (tok.type === 'word' && !this.isReserved(tok) && this.isPunctAt(1, '(')) {
      this.parseFunctionCall();
      return;
    }

    if (this.isName(tok)) {
      this.advance();
      if (this.matchPunct('.')) {
        const column = this.expectName('column name');
        this.use(tok.value, column);
      } else {
        this.use(undefined, tok.value);
      }
      return;
    }

    throw this.unexpected();
  }

  private parseFunctionCall(): void {
    const nameTok = this.advance();
    const name = nameTok.value.toUpperCase();
    const aggregate = AGGREGATE_FUNCTIONS.has(name);

    if (!aggregate && !SCALAR_FUNCTIONS.has(name)) {
      throw this.reject(`Function "${nameTok.value}" is not allowed.`);
    }

    this.expectPunct('(');
    if (aggregate && this.matchKeyword('DISTINCT')) {
      this.parseExpr();
    } else if (name === 'COUNT' && this.isOp('*')) {
      this.advance();
    } else {
      this.parseExprList();
    }
    this.expectPunct(')');
  }

  private parseCase(): void {
    if (!this.isKeyword('WHEN')) {
      this.parseExpr();
    }
    this.expectKeyword('WHEN');
    do {
      this.parseExpr();
      this.expectKeyword('THEN');
      this.parseExpr();
    } while (this.matchKeyword('WHEN'));
    if (this.matchKeyword('ELSE')) {
      this.parseExpr();
    }
    this.expectKeyword('END');
  }

  // ── Identifier resolution ────────────────────────────────────────

  private use(qualifier: string | undefined, column: string): void {
    const scope = this.current;
    if (!scope) {
      throw this.unexpected();
    }
    scope.uses.push({ qualifier, column, clause: scope.clause });
  }

  private resolve(scope: QueryScope): void {
    for (const use of scope.uses) {
      if (use.qualifier !== undefined) {
        const table = this.lookupQualifier(scope, use.qualifier);
        if (!table) {
          throw unknownReference(`Unknown table or alias "${use.qualifier}".`, {
            sql: this.sql,
            table: use.qualifier,
          });
        }
        if (use.column === '*') continue;
        this.requireColumn(table, use.column, `${use.qualifier}.${use.column}`);
        continue;
      }

      const key = use.column.toLowerCase();
      const aliasAllowed = use.clause === 'group' || use.clause === 'having' || use.clause === 'order';
      if (aliasAllowed && scope.outputAliases.has(key)) continue;

      const table = this.lookupColumnOwner(scope, use.column);
      if (!table) {
        throw unknownReference(`Unknown column "${use.column}".`, { sql: this.sql, column: use.column });
      }
      this.requireColumn(table, use.column, use.column);
    }
  }

  private lookupQualifier(scope: QueryScope, qualifier: string): TableDescriptor | undefined {
    const key = qualifier.toLowerCase();
    for (let s: QueryScope | undefined = scope; s; s = s.parent) {
      const table = s.tables.get(key);
      if (table) return table;
    }
    return undefined;
  }

  private lookupColumnOwner(scope: QueryScope, column: string): TableDescriptor | undefined {
    for (let s: QueryScope | undefined = scope; s; s = s.parent) {
      for (const table of s.tables.values()) {
        if (findColumn(table, column)) return table;
      }
    }
    return undefined;
  }

  private requireColumn(table: TableDescriptor, column: string, shown: string): void {
    const found = findColumn(table, column);
    if (!found) {
      throw unknownReference(`Unknown column "${shown}".`, { sql: this.sql, column: shown });
    }
    this.columns.add(`${table.name}.${found.name}`);
  }

  // ── Token helpers ────────────────────────────────────────────────

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private advance(): Token {
    const tok = this.peek();
    if (tok.type !== 'eof') this.pos++;
    return tok;
  }

  private isReserved(tok: Token): boolean {
    return tok.type === 'word' && KEYWORDS.has(tok.value.toUpperCase());
  }

  /** Plain word that is not a keyword, or a quoted identifier */
  private isName(tok: Token): boolean {
    return tok.type === 'identifier' || (tok.type === 'word' && !this.isReserved(tok));
  }

  private isKeyword(keyword: string): boolean {
    const tok = this.peek();
    return tok.type === 'word' && tok.value.toUpperCase() === keyword;
  }

  private isKeywordIn(keywords: Set<string>): boolean {
    const tok = this.peek();
    return tok.type === 'word' && keywords.has(tok.value.toUpperCase());
  }

  private matchKeyword(keyword: string): boolean {
    if (!this.isKeyword(keyword)) return false;
    this.advance();
    return true;
  }

  private expectKeyword(keyword: string): void {
    if (!this.matchKeyword(keyword)) {
      throw this.unexpected(keyword);
    }
  }

  private isPunct(value: string): boolean {
    return this.isPunctAt(0, value);
  }

  private isPunctAt(offset: number, value: string): boolean {
    const tok = this.peek(offset);
    return tok.type === 'punct' && tok.value === value;
  }

  private matchPunct(value: string): boolean {
    if (!this.isPunct(value)) return false;
    this.advance();
    return true;
  }

  private expectPunct(value: string): void {
    if (!this.matchPunct(value)) {
      throw this.unexpected(`"${value}"`);
    }
  }

  private isOp(value: string): boolean {
    return this.isOpAt(0, value);
  }

  private isOpAt(offset: number, value: string): boolean {
    const tok = this.peek(offset);
    return tok.type === 'op' && tok.value === value;
  }

  private expectName(what: string): string {
    const tok = this.peek();
    if (!this.isName(tok)) {
      throw this.unexpected(what);
    }
    this.advance();
    return tok.value;
  }

  private expectInteger(): void {
    const tok = this.peek();
    if (tok.type !== 'number' || !/^\d+$/.test(tok.value)) {
      throw this.reject('LIMIT and OFFSET must be integer literals.');
    }
    this.advance();
  }

  private expectString(): void {
    if (this.peek().type !== 'string') {
      throw this.unexpected('string literal');
    }
    this.advance();
  }

  private reject(message: string): PipelineError {
    return unsafeStatement(message, { sql: this.sql, offset: this.peek().pos });
  }

  private unexpected(expected?: string): PipelineError {
    const tok = this.peek();
    const found = tok.type === 'eof' ? 'end of statement' : `"${tok.value}"`;
    const hint = expected ? `; expected ${expected}` : '';
    return this.reject(`Unexpected ${found} at offset ${tok.pos}${hint}.`);
  }
}
