import type Database from 'better-sqlite3';
import type { User } from '@tally/shared';

// ── Row types ────────────────────────────────────────────────────

export interface UserRow {
  id: number;
  username: string;
  password_hash: string;
  disabled: number;         // SQLite boolean: 0 | 1
  created_at: string;
}

interface NewUserParams {
  username: string;
  password_hash: string;
  created_at: string;
}

// ── Repository ──────────────────────────────────────────────────

export class UserRepository {
  private insertStmt: Database.Statement<[NewUserParams], UserRow>;
  private getByIdStmt: Database.Statement<[number], UserRow>;
  private getByNameStmt: Database.Statement<[string], UserRow>;
  private listStmt: Database.Statement<[], UserRow>;
  private setDisabledStmt: Database.Statement<[number, number], UserRow>;

  constructor(db: Database.Database) {
    // Username uniqueness is settled by the index, so a concurrent duplicate
    // comes back as "no row" instead of a constraint exception.
    this.insertStmt = db.prepare<NewUserParams, UserRow>(`
      INSERT INTO users (username, password_hash, disabled, created_at)
      VALUES (@username, @password_hash, 0, @created_at)
      ON CONFLICT(username) DO NOTHING
      RETURNING *
    `);

    this.getByIdStmt = db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?');
    this.getByNameStmt = db.prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?');
    this.listStmt = db.prepare<[], UserRow>('SELECT * FROM users ORDER BY id ASC');
    this.setDisabledStmt = db.prepare<[number, number], UserRow>(
      'UPDATE users SET disabled = ? WHERE id = ? RETURNING *',
    );
  }

  /** Insert a user. Returns null when the username is already taken. */
  create(username: string, passwordHash: string, createdAt: string = new Date().toISOString()): User | null {
    const row = this.insertStmt.get({
      username,
      password_hash: passwordHash,
      created_at: createdAt,
    });
    return row ? toUser(row) : null;
  }

  getById(id: number): User | null {
    const row = this.getByIdStmt.get(id);
    return row ? toUser(row) : null;
  }

  /** Exact, case-sensitive match. */
  getByUsername(username: string): User | null {
    const row = this.getByNameStmt.get(username);
    return row ? toUser(row) : null;
  }

  list(): User[] {
    return this.listStmt.all().map(toUser);
  }

  setDisabled(id: number, disabled: boolean): User | null {
    const row = this.setDisabledStmt.get(disabled ? 1 : 0, id);
    return row ? toUser(row) : null;
  }
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    disabled: row.disabled === 1,
    createdAt: row.created_at,
  };
}
