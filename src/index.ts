#!/usr/bin/env node
// src/index.ts
import dotenv from "dotenv";
import { USAGE, parseCliArgs } from "./cli";
import { defaultOutputPath, parseJsonBody, saveJson, saveRaw } from "./lib/artifact";
import { getCredentials } from "./lib/credentials";
import { ConfigError, HttpStatusError, PayloadError, TransportError } from "./lib/errors";
import { Fetcher, assertOk, fetchQuery } from "./lib/fetchQuery";
import { applyLogLevel, log } from "./lib/logger";
import { formatUtcLabel } from "./lib/timeSpec";
import { makeRequestSpec, requestUrl } from "./services/RequestSpec";
import { summarizeResponse } from "./services/Summarizer";

export type RunDeps = {
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  fetch?: Fetcher;
};

/** Runs one query end to end and resolves to the process exit code. */
export async function run(argv: string[], deps: RunDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const now = deps.now ?? (() => new Date());
  const out = deps.stdout ?? ((line: string) => console.log(line));
  const err = deps.stderr ?? ((line: string) => console.error(line));
  const fetch = deps.fetch ?? fetchQuery;

  try {
    applyLogLevel(env.LOG_LEVEL);
    const opts = parseCliArgs(argv);
    if (opts.help) {
      out(USAGE);
      return 0;
    }

    const spec = makeRequestSpec(opts, now());
    const url = requestUrl(spec);
    const creds = getCredentials(opts.username, opts.password, env);

    const res = assertOk(await fetch(url, creds));
    const outPath = opts.out ?? defaultOutputPath(spec.format, formatUtcLabel(now()));

    if (spec.format === "json") {
      const payload = parseJsonBody(res.body);
      await saveJson(payload, outPath);
      log.info({ path: outPath }, "saved response");
      out(`Saved raw response to ${outPath}`);
      out("");
      out(summarizeResponse(payload));
    } else {
      await saveRaw(res.body, spec.format, outPath);
      log.info({ path: outPath, format: spec.format }, "saved response");
      out(`Saved raw response to ${outPath}`);
    }
    return 0;
  } catch (e) {
    if (e instanceof HttpStatusError) {
      out(e.message);
      return 1;
    }
    if (e instanceof ConfigError || e instanceof TransportError || e instanceof PayloadError) {
      err(e.message);
      return 1;
    }
    throw e;
  }
}

if (require.main === module) {
  dotenv.config();
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      log.error({ err: e }, "unexpected failure");
      process.exitCode = 1;
    });
}
