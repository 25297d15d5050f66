import 'dotenv/config';

import path from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import { bold, dim } from "colorette";

import { config as loadEnv } from "dotenv";

import { REVIEW_LEVELS, type ReviewLevel } from "@brevity/core";
import type { ProviderName } from "@brevity/provider-types";

import { runHookCLI, runReviewCLI } from "./review/review";
import { listProviders } from "./review/providers";
import { renderMdCLI } from "./cmd/render-md";
import { loadConfig } from "./config";
import {
  FAIL_ON_VALUES,
  type FailOn,
  exitCodeForError,
  fail,
  findRepoRoot,
  resolveRepoPath,
} from "./cli-utils";

// ────────────────────────────────────────────────────────────────────────────────
// Repo root (.git | fallback)
// ────────────────────────────────────────────────────────────────────────────────
const REPO_ROOT = findRepoRoot();

process.env.BREVITY_REPO_ROOT ||= REPO_ROOT;

loadEnv({ path: path.join(REPO_ROOT, ".env") });

interface CommonFlags {
  provider?: ProviderName;
  model?: string;
  timeout?: number;
  failOn?: FailOn;
  outJson?: string;
  outMd?: string;
  debug?: boolean;
}

interface ReviewFlags extends CommonFlags {
  diff?: string;
  staged?: boolean;
  level?: ReviewLevel;
  detailed?: boolean;
  file?: string[];
  reviewOnly?: boolean;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("expected a positive integer");
  return n;
}

function debugEnabled(flag?: boolean): boolean {
  return !!flag || process.env.BREVITY_DEBUG === "1" || process.env.BREVITY_DEBUG === "true";
}

/** Aborted on Ctrl-C so the pending model call is cancelled, not left running */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new Error("interrupted")));
  return controller.signal;
}

function configFromFlags(opts: CommonFlags) {
  return loadConfig({
    provider: opts.provider,
    model: opts.model,
    timeoutMs: opts.timeout,
    failOn: opts.failOn,
  });
}

async function runAction(debug: boolean, fn: () => Promise<number> | number): Promise<void> {
  try {
    process.exitCode = await fn();
  } catch (e) {
    fail(e instanceof Error ? e.message : String(e));
    if (debug && e instanceof Error && e.stack) console.error(dim(e.stack));
    process.exitCode = exitCodeForError(e);
  }
}

function addCommonOptions(cmd: Command): Command {
  return cmd
    .addOption(new Option("--provider <name>", "model backend").choices(listProviders()))
    .option("--model <id>", "model id for the selected provider")
    .option("--timeout <ms>", "give up on the model after <ms>", parsePositiveInt)
    .addOption(new Option("--fail-on <policy>", "exit 1 when findings match").choices(FAIL_ON_VALUES))
    .option("--out-json <path>", "override review.json output path (abs or repo-root relative)")
    .option("--out-md <path>", "override review.md output path (abs or repo-root relative)")
    .option("--debug", "verbose debug logs", false);
}

// ────────────────────────────────────────────────────────────────────────────────
const program = new Command()
  .name("brevity")
  .description(`${bold("brevity")} — token-budgeted AI code review of your diff`)
  .version("0.1.0");

program.showHelpAfterError();
program.showSuggestionAfterError();

// ────────────────────────────────────────────────────────────────────────────────
// review
// ────────────────────────────────────────────────────────────────────────────────
addCommonOptions(
  program
    .command("review")
    .description("Review a diff (file, staged changes or working tree), write JSON and Markdown")
    .option("-d, --diff <path>", "unified diff file (default: git diff)")
    .option("--staged", "review staged changes (git diff --cached)", false)
    .addOption(new Option("--level <level>", "review depth").choices(REVIEW_LEVELS))
    .option("--detailed", "shorthand for --level detailed", false)
    .option("-f, --file <path...>", "only review these paths or globs")
    .option("--review-only", "report only; the caller will not proceed to commit", false),
).action(async (opts: ReviewFlags) => {
  const debug = debugEnabled(opts.debug);
  await runAction(debug, () =>
    runReviewCLI({
      config: configFromFlags(opts),
      diff: opts.diff,
      staged: opts.staged,
      level: opts.detailed ? "detailed" : opts.level,
      files: opts.file,
      reviewOnly: opts.reviewOnly,
      outJson: opts.outJson,
      outMd: opts.outMd,
      debug,
      signal: interruptSignal(),
    }),
  );
});

// ────────────────────────────────────────────────────────────────────────────────
// hook (pre-commit)
// ────────────────────────────────────────────────────────────────────────────────
addCommonOptions(
  program
    .command("hook")
    .description("Review staged changes when enabled in config (for a pre-commit hook)"),
).action(async (opts: CommonFlags) => {
  const debug = debugEnabled(opts.debug);
  await runAction(debug, () =>
    runHookCLI({
      config: configFromFlags(opts),
      outJson: opts.outJson,
      outMd: opts.outMd,
      debug,
      signal: interruptSignal(),
    }),
  );
});

// ────────────────────────────────────────────────────────────────────────────────
// render-md
// ────────────────────────────────────────────────────────────────────────────────
program
  .command("render-md")
  .description("Render a saved review.json → human-friendly Markdown")
  .option("--in <path>", "input review.json (default from config)")
  .option("--out <path>", "output Markdown (default: <input>.human.md)")
  .option("--group-by-file", "one section per file instead of per category", false)
  .option("--title <title>", "document title")
  .action(async (opts: { in?: string; out?: string; groupByFile?: boolean; title?: string }) => {
    await runAction(false, () => {
      const rc = loadConfig();
      const inFile = opts.in ? resolveRepoPath(rc.repoRoot, opts.in) : rc.out.jsonAbs;
      const outFile = opts.out
        ? resolveRepoPath(rc.repoRoot, opts.out)
        : inFile.replace(/\.json$/i, "") + ".human.md";
      renderMdCLI({ repoRoot: rc.repoRoot, inFile, outFile, groupByFile: opts.groupByFile, title: opts.title });
      return 0;
    });
  });

// ────────────────────────────────────────────────────────────────────────────────
// config
// ────────────────────────────────────────────────────────────────────────────────
program
  .command("config")
  .description("Print the resolved configuration")
  .action(async () => {
    await runAction(false, () => {
      console.log(JSON.stringify(loadConfig(), null, 2));
      return 0;
    });
  });

// help footer
program.addHelpText(
  "afterAll",
  `
${dim("Config sources (priority high→low):")} CLI ${bold(">")} ENV ${bold(">")} .brevityrc.json|yaml ${bold(">")} defaults
Repo root: ${dim(REPO_ROOT)}
`
);

// run
program.parseAsync().catch((e: unknown) => {
  fail(e instanceof Error ? e.stack ?? e.message : String(e));
  process.exit(1);
});
