// apps/api/src/modules/users/users.repo.ts
import { dbFile } from "../../db/index";

export type UserRow = {
  id: number;
  username: string;
  displayName: string | null;
  createdAt: string;
};

const selectUserBase = `
  SELECT
    id,
    username,
    display_name AS displayName,
    created_at   AS createdAt
  FROM users
`;

const getUserByIdStmt = dbFile.prepare<[number], UserRow>(`
  ${selectUserBase}
  WHERE id = ?
`);

const insertUserStmt = dbFile.prepare<[string, string | null], UserRow>(`
  INSERT INTO users (username, display_name)
  VALUES (?, ?)
  RETURNING
    id,
    username,
    display_name AS displayName,
    created_at   AS createdAt
`);

export const usersRepo = {
  findById(id: number): UserRow | null {
    return getUserByIdStmt.get(id) ?? null;
  },

  createUser(username: string, displayName: string | null = null): UserRow {
    const row = insertUserStmt.get(username, displayName);
    if (!row) {
      throw new Error("Failed to load user after creation");
    }
    return row;
  }
};
