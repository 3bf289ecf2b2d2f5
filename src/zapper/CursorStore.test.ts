import { afterEach, beforeEach, describe, expect, test } from "vitest"
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { Effect } from "effect"
import {
  CursorStore,
  defaultCursorPath,
  makeFileCursorStore,
  makeMemoryCursorStore,
} from "./CursorStore.js"
import { PayIndex } from "../lightning/Invoice.js"

const withStore = <A, E>(
  path: string,
  effect: Effect.Effect<A, E, CursorStore>,
  startIndex = 0
): Promise<A> =>
  Effect.runPromise(
    Effect.provide(effect, makeFileCursorStore({ path, startIndex: PayIndex.make(startIndex) }))
  )

describe("file CursorStore", () => {
  let dir: string
  let path: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "zapwatch-cursor-"))
    path = join(dir, "state", "last_pay_index.json")
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  test("returns the start index when nothing was saved", async () => {
    const index = await withStore(path, Effect.flatMap(CursorStore, (s) => s.load()), 5)
    expect(index).toBe(5)
  })

  test("a restarted store resumes from the saved value", async () => {
    await withStore(
      path,
      Effect.gen(function* () {
        const store = yield* CursorStore
        yield* store.load()
        yield* store.save(PayIndex.make(41))
        yield* store.save(PayIndex.make(42))
      })
    )

    const index = await withStore(path, Effect.flatMap(CursorStore, (s) => s.load()))
    expect(index).toBe(42)
  })

  test("writes a JSON record and leaves no temporary file behind", async () => {
    await withStore(path, Effect.flatMap(CursorStore, (s) => s.save(PayIndex.make(7))))

    const record: unknown = JSON.parse(await readFile(path, "utf8"))
    expect(record).toMatchObject({ lastPayIndex: 7 })
    expect(await readdir(join(dir, "state"))).toEqual(["last_pay_index.json"])
  })

  test("a failed write reports the error and removes its temporary file", async () => {
    await mkdir(join(path, "occupied"), { recursive: true })

    const error = await withStore(path, Effect.flip(Effect.flatMap(CursorStore, (s) => s.save(PayIndex.make(1)))))

    expect(error).toMatchObject({ _tag: "CursorWriteError", path })
    expect(await readdir(join(dir, "state"))).toEqual(["last_pay_index.json"])
  })

  test("refuses to move backwards", async () => {
    const error = await withStore(
      path,
      Effect.gen(function* () {
        const store = yield* CursorStore
        yield* store.save(PayIndex.make(10))
        return yield* Effect.flip(store.save(PayIndex.make(9)))
      })
    )
    expect(error).toMatchObject({ _tag: "CursorRegression", current: 10, attempted: 9 })
  })

  test("refuses to go below a loaded value", async () => {
    await withStore(path, Effect.flatMap(CursorStore, (s) => s.save(PayIndex.make(30))))

    const error = await withStore(
      path,
      Effect.gen(function* () {
        const store = yield* CursorStore
        yield* store.load()
        return yield* Effect.flip(store.save(PayIndex.make(3)))
      })
    )
    expect(error._tag).toBe("CursorRegression")
  })

  test("saving the same value again succeeds", async () => {
    const index = await withStore(
      path,
      Effect.gen(function* () {
        const store = yield* CursorStore
        yield* store.save(PayIndex.make(4))
        yield* store.save(PayIndex.make(4))
        return yield* store.load()
      })
    )
    expect(index).toBe(4)
  })

  test("fails loudly on an unparsable record", async () => {
    await withStore(path, Effect.flatMap(CursorStore, (s) => s.save(PayIndex.make(1))))
    await writeFile(path, "last_pay_index=12")

    const error = await withStore(path, Effect.flip(Effect.flatMap(CursorStore, (s) => s.load())))
    expect(error).toMatchObject({ _tag: "CursorCorruption", path })
  })

  test("fails loudly on a record with a negative index", async () => {
    await withStore(path, Effect.flatMap(CursorStore, (s) => s.save(PayIndex.make(1))))
    await writeFile(path, JSON.stringify({ lastPayIndex: -1, updatedAt: "2026-01-01T00:00:00.000Z" }))

    const error = await withStore(path, Effect.flip(Effect.flatMap(CursorStore, (s) => s.load())))
    expect(error._tag).toBe("CursorCorruption")
  })

  test("fails loudly when the path is not a readable file", async () => {
    const error = await withStore(dir, Effect.flip(Effect.flatMap(CursorStore, (s) => s.load())))
    expect(error._tag).toBe("CursorCorruption")
  })
})

describe("memory CursorStore", () => {
  test("tracks saves and refuses regressions", async () => {
    const [index, error] = await Effect.runPromise(
      Effect.gen(function* () {
        const store = yield* CursorStore
        yield* store.save(PayIndex.make(3))
        const index = yield* store.load()
        const error = yield* Effect.flip(store.save(PayIndex.make(2)))
        return [index, error] as const
      }).pipe(Effect.provide(makeMemoryCursorStore()))
    )
    expect(index).toBe(3)
    expect(error._tag).toBe("CursorRegression")
  })
})

describe("defaultCursorPath", () => {
  test("lives under the XDG data directory", () => {
    const previous = process.env.XDG_DATA_HOME
    process.env.XDG_DATA_HOME = "/data"
    try {
      expect(defaultCursorPath()).toBe("/data/zapwatch/last_pay_index.json")
    } finally {
      if (previous === undefined) delete process.env.XDG_DATA_HOME
      else process.env.XDG_DATA_HOME = previous
    }
  })
})
