import bcrypt from "bcryptjs";
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import type { JurisdictionRegistry } from "./config/jurisdictions.js";
import { createLogger } from "./logger.js";

export type Db = Database.Database;

const log = createLogger("db");

let db: Db | null = null;

export function initDb(filePath: string): Db {
  if (db) return db;
  db = openDb(filePath);
  return db;
}

export function closeDb() {
  db?.close();
  db = null;
}

/** Opens a database and applies the schema. `:memory:` gives a private, throwaway database. */
export function openDb(filePath: string): Db {
  if (filePath !== ":memory:") {
    const dataDir = path.dirname(path.resolve(process.cwd(), filePath));
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const database = new Database(filePath);
  database.pragma("journal_mode = WAL");
  database.pragma("foreign_keys = ON");

  database.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      email TEXT UNIQUE NOT NULL,
      password TEXT NOT NULL,
      name TEXT NOT NULL,
      role TEXT NOT NULL CHECK(role IN ('citizen', 'authority', 'admin')),
      unit_id TEXT,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS user_sessions (
      token TEXT PRIMARY KEY,
      user_id INTEGER NOT NULL,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (user_id) REFERENCES users(id)
    );

    CREATE TABLE IF NOT EXISTS issues (
      id TEXT PRIMARY KEY,
      category TEXT NOT NULL CHECK(category IN ('roads', 'lighting', 'water', 'health', 'education', 'other')),
      latitude REAL NOT NULL,
      longitude REAL NOT NULL,
      member_count INTEGER NOT NULL DEFAULT 1 CHECK(member_count >= 1),
      status TEXT NOT NULL DEFAULT 'reported' CHECK(status IN ('reported', 'acknowledged', 'in_progress', 'resolved', 'rejected')),
      priority TEXT NOT NULL DEFAULT 'medium' CHECK(priority IN ('low', 'medium', 'high', 'urgent')),
      unit_id TEXT NOT NULL,
      created_at TEXT NOT NULL,
      last_transition_at TEXT NOT NULL,
      version INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS reports (
      id TEXT PRIMARY KEY,
      submitter_id TEXT NOT NULL,
      category TEXT NOT NULL CHECK(category IN ('roads', 'lighting', 'water', 'health', 'education', 'other')),
      description TEXT NOT NULL,
      latitude REAL NOT NULL,
      longitude REAL NOT NULL,
      submitted_at TEXT NOT NULL,
      media_ref TEXT,
      issue_id TEXT,
      FOREIGN KEY (issue_id) REFERENCES issues(id)
    );

    CREATE TABLE IF NOT EXISTS status_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      issue_id TEXT NOT NULL,
      from_status TEXT,
      to_status TEXT NOT NULL,
      actor_id TEXT NOT NULL,
      note TEXT,
      at TEXT NOT NULL,
      FOREIGN KEY (issue_id) REFERENCES issues(id)
    );

    CREATE TABLE IF NOT EXISTS notifications (
      id TEXT PRIMARY KEY,
      recipient_id TEXT NOT NULL,
      kind TEXT NOT NULL CHECK(kind IN ('status_changed', 'escalation', 'no_jurisdiction')),
      title TEXT NOT NULL,
      body TEXT NOT NULL,
      issue_id TEXT,
      is_read INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL
    );
  `);

  database.exec("CREATE INDEX IF NOT EXISTS idx_reports_issue ON reports(issue_id)");
  database.exec("CREATE INDEX IF NOT EXISTS idx_reports_submitter ON reports(submitter_id, submitted_at)");
  database.exec("CREATE INDEX IF NOT EXISTS idx_issues_listing ON issues(status, category, unit_id, created_at)");
  database.exec("CREATE INDEX IF NOT EXISTS idx_status_events_issue ON status_events(issue_id, id)");
  database.exec("CREATE INDEX IF NOT EXISTS idx_notifications_recipient ON notifications(recipient_id, created_at)");

  return database;
}

/**
 * Demo accounts: one admin, one official per configured unit and one citizen. Passwords are
 * placeholders for local use only.
 */
export function seedDemoUsers(database: Db, registry: JurisdictionRegistry) {
  const insertUser = database.prepare(
    "INSERT OR IGNORE INTO users (email, password, name, role, unit_id) VALUES (?, ?, ?, ?, ?)"
  );

  insertUser.run("admin@civic.local", bcrypt.hashSync("admin-demo-password", 10), "Platform Admin", "admin", null);
  insertUser.run("citizen@civic.local", bcrypt.hashSync("citizen-demo-password", 10), "Demo Citizen", "citizen", null);

  const officialHash = bcrypt.hashSync("official-demo-password", 10);
  for (const unit of registry.units) {
    insertUser.run(`${unit.id}@civic.local`, officialHash, `${unit.name} Officer`, "authority", unit.id);
  }

  log.info("Seeded demo users", { officials: registry.units.length });
}
