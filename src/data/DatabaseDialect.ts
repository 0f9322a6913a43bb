/**
 * SQL fragments that differ between PostgreSQL and SQLite.
 * Queries are written once with PostgreSQL-style `$N` placeholders.
 */

export type DatabaseProvider = 'postgresql' | 'sqlite' | 'memory';

export type SqlParam = string | number | boolean | null;

export interface SQLDialect {
  provider: DatabaseProvider;

  serialPrimaryKey(): string;
  jsonType(): string;
  timestamp(): string;
  boolean(): string;
  decimal(): string;
  integer(): string;
  varchar(length: number): string;
  text(): string;

  now(): string;

  onConflictDoUpdate(conflictTarget: string, updateSet: string): string;
  onConflictDoNothing(conflictTarget: string): string;
}

export class PostgreSQLDialect implements SQLDialect {
  provider: DatabaseProvider = 'postgresql';

  serialPrimaryKey(): string {
    return 'SERIAL PRIMARY KEY';
  }

  jsonType(): string {
    return 'JSONB';
  }

  timestamp(): string {
    return 'TIMESTAMPTZ';
  }

  boolean(): string {
    return 'BOOLEAN';
  }

  decimal(): string {
    // float8 comes back from pg as a JS number; NUMERIC would come back as a string
    return 'DOUBLE PRECISION';
  }

  integer(): string {
    return 'INTEGER';
  }

  varchar(length: number): string {
    return `VARCHAR(${length})`;
  }

  text(): string {
    return 'TEXT';
  }

  now(): string {
    return 'NOW()';
  }

  onConflictDoUpdate(conflictTarget: string, updateSet: string): string {
    return `ON CONFLICT (${conflictTarget}) DO UPDATE SET ${updateSet}`;
  }

  onConflictDoNothing(conflictTarget: string): string {
    return `ON CONFLICT (${conflictTarget}) DO NOTHING`;
  }
}

export class SQLiteDialect implements SQLDialect {
  provider: DatabaseProvider = 'sqlite';

  serialPrimaryKey(): string {
    return 'INTEGER PRIMARY KEY AUTOINCREMENT';
  }

  jsonType(): string {
    return 'TEXT';
  }

  timestamp(): string {
    // ISO-8601 text sorts chronologically
    return 'TEXT';
  }

  boolean(): string {
    return 'INTEGER';
  }

  decimal(): string {
    return 'REAL';
  }

  integer(): string {
    return 'INTEGER';
  }

  varchar(_length: number): string {
    return 'TEXT';
  }

  text(): string {
    return 'TEXT';
  }

  now(): string {
    return "(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))";
  }

  onConflictDoUpdate(conflictTarget: string, updateSet: string): string {
    return `ON CONFLICT(${conflictTarget}) DO UPDATE SET ${updateSet}`;
  }

  onConflictDoNothing(conflictTarget: string): string {
    return `ON CONFLICT(${conflictTarget}) DO NOTHING`;
  }
}

export class MemoryDialect extends SQLiteDialect {
  provider: DatabaseProvider = 'memory';
}

export function getDialect(provider: DatabaseProvider): SQLDialect {
  switch (provider) {
    case 'postgresql':
      return new PostgreSQLDialect();
    case 'sqlite':
      return new SQLiteDialect();
    case 'memory':
      return new MemoryDialect();
  }
}

/**
 * Rewrite `$N` placeholders to positional `?` for SQLite, expanding the
 * parameter list in order of appearance so a reused placeholder binds twice.
 */
export function convertParameters(
  sql: string,
  params: SqlParam[],
  toDialect: DatabaseProvider
): { sql: string; params: SqlParam[] } {
  if (toDialect === 'postgresql') {
    return { sql, params };
  }

  const ordered: SqlParam[] = [];
  const convertedSql = sql.replace(/\$(\d+)/g, (_match, index: string) => {
    const value = params[Number(index) - 1];
    ordered.push(value === undefined ? null : value);
    return '?';
  });

  return { sql: convertedSql, params: ordered };
}
