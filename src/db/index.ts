/**
 * Database connection manager
 *
 * One better-sqlite3 connection per process, opened lazily and migrated on
 * open. Asking for a different path closes the previous connection.
 */

import Database from "better-sqlite3"
import { existsSync, mkdirSync, readdirSync } from "node:fs"
import { dirname, join } from "node:path"
import { fileURLToPath } from "node:url"
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3"
import { migrate } from "drizzle-orm/better-sqlite3/migrator"
import * as schema from "./schema.js"
import { log } from "../logger.js"

export type DbClient = BetterSQLite3Database<typeof schema>

interface Connection {
	db: DbClient
	sqlite: Database.Database
	path: string
}

/** drizzle/ at the package root, for both src/db and dist/db */
export const MIGRATIONS_DIR = join(
	dirname(fileURLToPath(import.meta.url)),
	"../../drizzle",
)

export const DEFAULT_CACHE_FILENAME = ".fetchm-cache.db"

let connection: Connection | null = null

export function hasMigrationFiles(): boolean {
	if (!existsSync(join(MIGRATIONS_DIR, "meta", "_journal.json"))) return false
	return readdirSync(MIGRATIONS_DIR).some(f => f.endsWith(".sql"))
}

/**
 * Open (or reuse) the database at `dbPath` and apply pending migrations.
 * `:memory:` opens a private in-memory database.
 */
export function getDb(dbPath: string): DbClient {
	if (connection && connection.path === dbPath) {
		return connection.db
	}
	if (connection) {
		closeDb()
	}

	if (dbPath !== ":memory:") {
		const dir = dirname(dbPath)
		if (!existsSync(dir)) mkdirSync(dir, { recursive: true })
	}

	const sqlite = new Database(dbPath)
	if (dbPath !== ":memory:") {
		sqlite.pragma("journal_mode = WAL")
	}
	sqlite.pragma("synchronous = NORMAL")
	sqlite.pragma("temp_store = MEMORY")

	const db = drizzle(sqlite, { schema })

	if (!hasMigrationFiles()) {
		sqlite.close()
		throw new Error(`No database migrations found in ${MIGRATIONS_DIR}`)
	}

	try {
		migrate(db, { migrationsFolder: MIGRATIONS_DIR })
		log.db.debug({ dbPath }, "cache database ready")
	} catch (err) {
		sqlite.close()
		const message = err instanceof Error ? err.message : String(err)
		throw new Error(`Failed to run database migrations: ${message}`)
	}

	connection = { db, sqlite, path: dbPath }
	return db
}

/** Close the open connection, if any. Safe to call repeatedly. */
export function closeDb(): void {
	if (!connection) return
	const { sqlite, path } = connection
	connection = null

	try {
		if (path !== ":memory:") sqlite.pragma("wal_checkpoint(TRUNCATE)")
	} catch (err) {
		log.db.warn(
			{ path, err: err instanceof Error ? err.message : String(err) },
			"WAL checkpoint failed",
		)
	}
	sqlite.close()
}

export function getDbPath(): string | null {
	return connection?.path ?? null
}

/** Cache file location for an output directory */
export function resolveCachePath(outdir: string, cachePath?: string): string {
	return cachePath ?? join(outdir, DEFAULT_CACHE_FILENAME)
}

export * from "./schema.js"
