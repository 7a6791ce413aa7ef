/**
 * Run a command's effect with the CLI logger installed.
 */
import { Effect } from "effect";
import { loggingLayer } from "@piecewise/runtime";
import { resolveLogLevel } from "./resolve.js";
import type { KV } from "./parse.js";

export function runCommand<A, E>(kv: KV, program: Effect.Effect<A, E>): Promise<A> {
  return Effect.runPromise(program.pipe(Effect.provide(loggingLayer(resolveLogLevel(kv)))));
}
