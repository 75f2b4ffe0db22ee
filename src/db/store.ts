import { DataSource, EntityManager, QueryFailedError } from 'typeorm'
import { ConstraintViolation, DatabaseBusy } from '../services/errors.js'

type Work<T> = (manager: EntityManager) => Promise<T>

const settle = () => undefined

/**
 * Owns the data source and the boundary every operation crosses.
 *
 * The embedded database has one connection shared by every caller, so
 * transactions and reads are queued: each starts only after the previous one
 * has committed or rolled back. Work handed to `transaction` or `read` must use
 * the manager it receives and must not call back into the store.
 */
export class Store {
  private tail: Promise<void> = Promise.resolve()

  constructor(readonly dataSource: DataSource) {}

  static async open(dataSource: DataSource): Promise<Store> {
    if (!dataSource.isInitialized) await dataSource.initialize()
    await dataSource.runMigrations()
    return new Store(dataSource)
  }

  async close(): Promise<void> {
    await this.tail
    if (this.dataSource.isInitialized) await this.dataSource.destroy()
  }

  transaction<T>(work: Work<T>): Promise<T> {
    return this.enqueue(() => this.dataSource.transaction(work))
  }

  read<T>(work: Work<T>): Promise<T> {
    return this.enqueue(() => work(this.dataSource.manager))
  }

  private enqueue<T>(run: () => Promise<T>): Promise<T> {
    const result = this.tail.then(run)
    // the queue moves on either way; the caller sees the outcome through `result`
    this.tail = result.then(settle, settle)
    return result.catch((err: unknown) => {
      throw translateError(err)
    })
  }
}

export type Reader = Store | EntityManager

/** Runs a read on a caller's transaction when given one, else through the queue. */
export function withReader<T>(db: Reader, work: Work<T>): Promise<T> {
  return db instanceof Store ? db.read(work) : work(db)
}

function constraintKind(code: string): ConstraintViolation['kind'] {
  if (code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY') return 'unique'
  if (code === 'SQLITE_CONSTRAINT_CHECK') return 'check'
  if (code === 'SQLITE_CONSTRAINT_FOREIGNKEY') return 'foreign_key'
  if (code === 'SQLITE_CONSTRAINT_NOTNULL') return 'not_null'
  return 'domain'
}

/**
 * Maps SQLite constraint failures onto ConstraintViolation and lock timeouts
 * from another connection onto DatabaseBusy; other errors pass through.
 */
export function translateError(err: unknown): unknown {
  if (!(err instanceof QueryFailedError)) return err
  const driverError: unknown = err.driverError
  if (typeof driverError !== 'object' || driverError === null || !('code' in driverError)) return err
  const code = String(driverError.code)
  const message = 'message' in driverError && typeof driverError.message === 'string' ? driverError.message : err.message
  if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED')) return new DatabaseBusy(message)
  if (!code.startsWith('SQLITE_CONSTRAINT')) return err
  const table = /constraint failed: (\w+)\./i.exec(message)?.[1] ?? null
  return new ConstraintViolation(message, table, constraintKind(code))
}
