/**
 * Tests for option parsing - flags first, then environment, then defaults.
 */

import { describe, expect, test } from "vitest"
import { Command } from "@effect/cli"
import { NodeContext } from "@effect/platform-node"
import { ConfigProvider, Effect, pipe } from "effect"

import * as Opts from "./options"
import type { RenameCommandOptions } from "./options"

const parse = async (
  args: ReadonlyArray<string>,
  env: Record<string, string> = {}
): Promise<RenameCommandOptions | undefined> => {
  let parsed: RenameCommandOptions | undefined

  const command = Command.make(
    "prefix-renamer",
    { source: Opts.source, dest: Opts.dest, debug: Opts.debug },
    (opts) =>
      Effect.sync(() => {
        parsed = opts
      })
  )
  const cli = Command.run(command, { name: "prefix-renamer", version: "0.1.0" })

  await pipe(
    cli(["node", "prefix-renamer", ...args]),
    Effect.provide(NodeContext.layer),
    Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env)))),
    Effect.runPromise
  )

  return parsed
}

describe("rename command options", () => {
  test("defaults when neither flags nor environment are set", async () => {
    expect(await parse([])).toEqual({ source: "sounds", dest: "harmonium-sounds", debug: false })
  })

  test("environment fills in missing flags", async () => {
    expect(await parse([], { PREFIX_RENAMER_SOURCE: "envsrc" })).toEqual({
      source: "envsrc",
      dest: "harmonium-sounds",
      debug: false,
    })
    expect(await parse([], { PREFIX_RENAMER_DEST: "envdest" })).toEqual({
      source: "sounds",
      dest: "envdest",
      debug: false,
    })
  })

  test("flags win over environment", async () => {
    const env = { PREFIX_RENAMER_SOURCE: "envsrc", PREFIX_RENAMER_DEST: "envdest" }

    expect(await parse(["--source", "in", "--dest", "out", "--debug"], env)).toEqual({
      source: "in",
      dest: "out",
      debug: true,
    })
  })

  test("short aliases", async () => {
    expect(await parse(["-s", "in", "-d", "out"])).toEqual({
      source: "in",
      dest: "out",
      debug: false,
    })
  })
})
