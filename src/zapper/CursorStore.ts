/**
 * CursorStore
 *
 * Durable record of the last handled pay index. The payment watcher is
 * its only writer.
 */
import { mkdir, open, readFile, rename, rm } from "node:fs/promises"
import { homedir } from "node:os"
import { dirname, join } from "node:path"
import { Context, Effect, Layer, Ref } from "effect"
import { Schema } from "@effect/schema"
import { CursorCorruption, CursorRegression, CursorWriteError } from "../core/Errors.js"
import { PayIndex } from "../lightning/Invoice.js"

// =============================================================================
// Types
// =============================================================================

/** On-disk cursor record */
export const CursorRecord = Schema.Struct({
  lastPayIndex: PayIndex,
  updatedAt: Schema.String,
})
export type CursorRecord = typeof CursorRecord.Type

const decodeRecord = Schema.decodeUnknown(Schema.parseJson(CursorRecord))

export interface FileCursorStoreConfig {
  readonly path: string
  /** Value returned by load() when no cursor has been persisted yet */
  readonly startIndex: PayIndex
}

// =============================================================================
// Service Interface
// =============================================================================

export interface CursorStore {
  readonly _tag: "CursorStore"

  /**
   * Restore the cursor, or the configured start index if none was saved.
   * Fails loudly on a record that cannot be trusted.
   */
  load(): Effect.Effect<PayIndex, CursorCorruption>

  /**
   * Persist the cursor. Returns only once the value is durable.
   * Saving a lower value than the current one fails.
   */
  save(index: PayIndex): Effect.Effect<void, CursorWriteError | CursorRegression>
}

// =============================================================================
// Service Tag
// =============================================================================

export const CursorStore = Context.GenericTag<CursorStore>("CursorStore")

/**
 * Default cursor location under the user's data directory
 */
export const defaultCursorPath = (): string =>
  join(process.env.XDG_DATA_HOME ?? join(homedir(), ".local", "share"), "zapwatch", "last_pay_index.json")

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT"

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

// =============================================================================
// File Implementation
// =============================================================================

/**
 * Write to a sibling temp file, flush it, then rename over the target so a
 * crash leaves either the old record or the new one.
 */
async function writeAtomically(path: string, contents: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  const tmpPath = `${path}.${process.pid}.tmp`
  try {
    const file = await open(tmpPath, "w", 0o600)
    try {
      await file.writeFile(contents, "utf8")
      await file.sync()
    } finally {
      await file.close()
    }
    await rename(tmpPath, path)
  } catch (error) {
    await rm(tmpPath, { force: true })
    throw error
  }
  const dir = await open(dirname(path), "r")
  try {
    await dir.sync()
  } finally {
    await dir.close()
  }
}

const makeFile = (config: FileCursorStoreConfig) =>
  Effect.gen(function* () {
    const current = yield* Ref.make<PayIndex>(config.startIndex)

    const load: CursorStore["load"] = () =>
      Effect.gen(function* () {
        const raw = yield* Effect.tryPromise({
          try: () => readFile(config.path, "utf8"),
          catch: (error) => error,
        }).pipe(
          Effect.map((text): string | null => text),
          Effect.catchAll((error) =>
            isMissingFile(error)
              ? Effect.succeed(null)
              : Effect.fail(
                  new CursorCorruption({
                    message: `Cannot read cursor: ${describe(error)}`,
                    path: config.path,
                  })
                )
          )
        )

        if (raw === null) {
          yield* Ref.set(current, config.startIndex)
          return config.startIndex
        }

        const record = yield* decodeRecord(raw).pipe(
          Effect.mapError(
            (error) =>
              new CursorCorruption({
                message: `Cursor record is not valid: ${error.message}`,
                path: config.path,
              })
          )
        )
        yield* Ref.set(current, record.lastPayIndex)
        return record.lastPayIndex
      })

    const save: CursorStore["save"] = (index) =>
      Effect.gen(function* () {
        const previous = yield* Ref.get(current)
        if (index < previous) {
          return yield* new CursorRegression({ current: previous, attempted: index })
        }

        const record: CursorRecord = { lastPayIndex: index, updatedAt: new Date().toISOString() }
        yield* Effect.tryPromise({
          try: () => writeAtomically(config.path, `${JSON.stringify(record)}\n`),
          catch: (error) =>
            new CursorWriteError({
              message: `Failed to persist cursor: ${describe(error)}`,
              path: config.path,
            }),
        })
        yield* Ref.set(current, index)
      })

    return { _tag: "CursorStore" as const, load, save }
  })

// =============================================================================
// Memory Implementation
// =============================================================================

const makeMemory = (startIndex: PayIndex) =>
  Effect.gen(function* () {
    const current = yield* Ref.make<PayIndex>(startIndex)

    return {
      _tag: "CursorStore" as const,
      load: () => Ref.get(current),
      save: (index: PayIndex) =>
        Effect.gen(function* () {
          const previous = yield* Ref.get(current)
          if (index < previous) {
            return yield* new CursorRegression({ current: previous, attempted: index })
          }
          yield* Ref.set(current, index)
        }),
    } satisfies CursorStore
  })

// =============================================================================
// Layer Constructors
// =============================================================================

export const makeFileCursorStore = (config: FileCursorStoreConfig): Layer.Layer<CursorStore> =>
  Layer.effect(CursorStore, makeFile(config))

/**
 * Process-local cursor, for tests and dry runs
 */
export const makeMemoryCursorStore = (startIndex: PayIndex = PayIndex.make(0)): Layer.Layer<CursorStore> =>
  Layer.effect(CursorStore, makeMemory(startIndex))
