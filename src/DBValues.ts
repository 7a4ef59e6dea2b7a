/**
 * relmapper - Value Tokens
 *
 * Tokens stand in for a plain value in create/update data when the value has
 * to be rendered as SQL rather than bound as a parameter.
 *
 * @example
 * ```typescript
 * await posts.update(Post.id.equals(1), { views: increment(1), updatedAt: dbNow() }).exec();
 * // → UPDATE posts SET views = views + ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?
 * ```
 */

// ============================================
// DBToken
// ============================================

export abstract class DBToken {
  /**
   * Render the value for assignment to `column` (already quoted), pushing any
   * bound parameters onto `params`.
   */
  abstract compile(params: unknown[], column: string): string;
}

// ============================================
// Literal / Raw Values
// ============================================

/**
 * Literal SQL rendered as-is (no parameter binding).
 */
export class DBImmediateValue extends DBToken {
  constructor(readonly sql: string) {
    super();
  }

  compile(): string {
    return this.sql;
  }
}

/**
 * Raw SQL fragment with its own `?` parameters.
 */
export class DBRawValue extends DBToken {
  constructor(
    readonly sql: string,
    readonly values: readonly unknown[] = []
  ) {
    super();
  }

  compile(params: unknown[]): string {
    params.push(...this.values);
    return this.sql;
  }
}

// ============================================
// Atomic Arithmetic
// ============================================

export type ArithmeticOperator = '+' | '-' | '*' | '/';

/**
 * `column = column <op> ?`, applied by the database in the same statement.
 */
export class DBArithmetic extends DBToken {
  constructor(
    readonly operator: ArithmeticOperator,
    readonly operand: number
  ) {
    super();
  }

  compile(params: unknown[], column: string): string {
    params.push(this.operand);
    return `${column} ${this.operator} ?`;
  }
}

// ============================================
// Factory Functions
// ============================================

export function dbNow(): DBImmediateValue {
  return new DBImmediateValue('CURRENT_TIMESTAMP');
}

export function dbRaw(sql: string, values: readonly unknown[] = []): DBRawValue {
  return new DBRawValue(sql, values);
}

export function increment(by: number): DBArithmetic {
  return new DBArithmetic('+', by);
}

export function decrement(by: number): DBArithmetic {
  return new DBArithmetic('-', by);
}

export function multiply(by: number): DBArithmetic {
  return new DBArithmetic('*', by);
}

export function divide(by: number): DBArithmetic {
  return new DBArithmetic('/', by);
}
