import Database from "better-sqlite3";
import path from "node:path";

/**
 * Open the catalog file read-only. The file must already exist: this process
 * never creates or migrates it.
 */
export const openReadOnlyDatabase = (filePath: string): Database.Database => {
  const absolutePath = path.resolve(process.cwd(), filePath);
  const db = new Database(absolutePath, { readonly: true, fileMustExist: true });
  db.pragma("busy_timeout = 5000");
  db.pragma("query_only = ON");
  return db;
};
