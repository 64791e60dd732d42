#!/usr/bin/env node
import { NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"

import { StderrLogger } from "../shell/logger.js"
import { NodeStdio } from "../shell/stdio.js"
import { runCli } from "./program.js"

// CHANGE: wire the converter into the Node runtime
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): "It is a CLI utility, not a service."
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult
// PURITY: SHELL
// EFFECT: Effect<void, never, Stdio>
// INVARIANT: non-zero exit codes terminate the process
// COMPLEXITY: O(1)

const main = Effect.gen(function*(_) {
  const result = yield* _(runCli(process.argv))
  if (result.exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = result.exitCode
      })
    )
  }
})

NodeRuntime.runMain(Effect.provide(main, Layer.merge(NodeStdio, StderrLogger)))
