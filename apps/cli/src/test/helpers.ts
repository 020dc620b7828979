import { Effect } from "effect";
import { fileURLToPath } from "url";
import { TestLayer } from "../layers";
import type { Config, Records } from "../services";

export const FAMILY_FIXTURE = fileURLToPath(new URL("./fixtures/family.json", import.meta.url));

/** Runs an effect against a fresh in-memory store */
export const runTest = <A, E>(effect: Effect.Effect<A, E, Config | Records>) =>
  Effect.runPromise(effect.pipe(Effect.provide(TestLayer)));
