/**
 * Command dispatcher for the decigraph CLI.
 *
 * Arguments are parsed by hand; each command returns its exit code (0 on
 * success, 1 on errors or a rejected mutation). Output goes through the
 * injected `CliIO` so tests can capture it.
 */

import { readFile, stat } from "node:fs/promises";
import { join, relative } from "node:path";
import { CASCADE_DIRECTIONS, type CascadeDirection } from "../analysis/cascade.js";
import { DEFAULT_TOP_N } from "../analysis/frontier.js";
import { isManifestTarget, type ManifestTarget } from "../analysis/manifest.js";
import { countByScope, renderHealth, renderIndex } from "../analysis/reports.js";
import { healthPath, lintConfigPath, scratchpadPath, type Config } from "../config/index.js";
import { isMissingFile, loadLintConfig } from "../config/lint-config.js";
import type { Scope } from "../graph/types.js";
import { coerceSetValue, DecisionService, parseDependencyList, parseLevel } from "../services/decision-service.js";
import { writeFileAtomic } from "../store/atomic.js";
import { FileDecisionStore } from "../store/decision-store.js";
import { ScratchpadStore } from "../store/scratchpad-store.js";
import { DecisionGraphError, GraphLoadError, UsageError } from "../utils/errors.js";
import { validate } from "../validators/graph-validator.js";
import * as render from "./render.js";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliContext {
  config: Config;
  service: DecisionService;
  scratchpad: ScratchpadStore;
  io: CliIO;
}

export const USAGE = `decigraph: graph operations for a decision system

Read:
  validate                                   Check frontmatter, graph topology and body content
  cascade ID [--reverse] [--json|--markdown] Propagation downstream (or upstream with --reverse)
  frontier [--top N] [--json|--markdown]     What to decide next
  search TERM... [--json]                    Search titles and bodies
  index                                      Regenerate INDEX.md per partition
  health                                     Regenerate HEALTH.md
  compile-manifest [--target human|agent] [--json]

Write:
  create ID --title T --level N [--state S] [--stakes S] [--depends-on A,B] [--constitution]
  set ID FIELD VALUE...                      FIELD is state, depends_on, level, stakes or title
  edit ID OLD NEW                            Replace body text, reporting the validation delta

Scratchpad:
  scratchpad add --type TYPE CONTENT [--links A,B]
  scratchpad list [--type TYPE] [--json]
  scratchpad mature SP-NNN DEC-NNN
  scratchpad-summary`;

export async function createCliContext(config: Config, io: CliIO, now?: () => Date): Promise<CliContext> {
  const store = new FileDecisionStore({
    projectDir: config.paths.projectDir,
    constitutionDir: config.paths.constitutionDir,
    now,
  });
  const lintConfig = await loadLintConfig(lintConfigPath(config));
  const service = new DecisionService({ store, lintConfig, now });
  const scratchpad = new ScratchpadStore({
    filePath: scratchpadPath(config),
    loadGraph: () => service.loadGraph(),
    now,
  });
  return { config, service, scratchpad, io };
}

// =============================================================================
// Argument parsing
// =============================================================================

interface ParsedArgs {
  positionals: string[];
  values: Map<string, string>;
  switches: Set<string>;
}

/**
 * Split arguments into positionals, `--flag value` pairs and bare switches.
 * Any other `--` argument is an error.
 */
function parseArgs(args: string[], valueFlags: string[], switchFlags: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], values: new Map(), switches: new Set() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valueFlags.includes(arg)) {
      const value = args[i + 1];
      if (value === undefined) throw new UsageError(`${arg} requires a value`);
      parsed.values.set(arg, value);
      i++;
    } else if (switchFlags.includes(arg)) {
      parsed.switches.add(arg);
    } else if (arg.startsWith("--")) {
      throw new UsageError(`unknown flag '${arg}'`);
    } else {
      parsed.positionals.push(arg);
    }
  }
  return parsed;
}

function parseTop(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_TOP_N;
  if (!/^\d+$/.test(raw)) throw new UsageError(`--top must be a number, got '${raw}'`);
  return Number.parseInt(raw, 10);
}

function printJson(io: CliIO, value: unknown): void {
  io.out(JSON.stringify(value, null, 2));
}

function printAll(io: CliIO, lines: string[]): void {
  for (const line of lines) io.out(line);
}

function printFindings(io: CliIO, errors: string[], warnings: string[]): void {
  for (const warning of warnings) io.err(`WARNING: ${warning}`);
  for (const error of errors) io.err(`ERROR: ${error}`);
}

async function directoryExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isMissingFile(error)) return false;
    throw error;
  }
}

// =============================================================================
// Read commands
// =============================================================================

async function cmdValidate(ctx: CliContext): Promise<number> {
  const report = await ctx.service.validate();
  printAll(ctx.io, render.renderValidation(report));
  return report.errors.length > 0 ? 1 : 0;
}

async function cmdCascade(ctx: CliContext, args: string[]): Promise<number> {
  const parsed = parseArgs(args, [], ["--reverse", "--json", "--markdown"]);
  const id = parsed.positionals[0];
  if (!id) throw new UsageError("Usage: decigraph cascade ID [--json|--markdown] [--reverse]");

  const direction: CascadeDirection = parsed.switches.has("--reverse") ? CASCADE_DIRECTIONS[1] : CASCADE_DIRECTIONS[0];
  const result = await ctx.service.cascade(id, direction);

  if (parsed.switches.has("--json")) {
    printJson(ctx.io, result);
  } else if (parsed.switches.has("--markdown")) {
    printAll(ctx.io, render.renderCascadeMarkdown(result));
  } else {
    printAll(ctx.io, render.renderCascadeTable(result));
  }
  return 0;
}

async function cmdFrontier(ctx: CliContext, args: string[]): Promise<number> {
  const parsed = parseArgs(args, ["--top"], ["--json", "--markdown"]);
  const top = parseTop(parsed.values.get("--top"));
  const result = await ctx.service.frontier(top);

  if (parsed.switches.has("--json")) {
    const { committable, blocked, level_gaps, high_weight, summary } = result;
    printJson(ctx.io, { frontier: { committable_now: committable, blocked, level_gaps, high_weight }, summary });
  } else if (parsed.switches.has("--markdown")) {
    printAll(ctx.io, render.renderFrontierMarkdown(result, top));
  } else {
    printAll(ctx.io, render.renderFrontierTable(result, top));
  }
  return 0;
}

async function cmdSearch(ctx: CliContext, args: string[]): Promise<number> {
  const parsed = parseArgs(args, [], ["--json"]);
  const terms = parsed.positionals.map((term) => term.toLowerCase());
  if (terms.length === 0) throw new UsageError("Usage: decigraph search TERM [TERM ...] [--json]");

  const results = await ctx.service.search(terms);
  if (parsed.switches.has("--json")) {
    printJson(ctx.io, { query: terms, count: results.length, results });
  } else {
    printAll(ctx.io, render.renderSearch(results, terms));
  }
  return 0;
}

async function cmdIndex(ctx: CliContext): Promise<number> {
  const graph = await ctx.service.loadGraph();
  const { root, constitutionDir, projectDir } = ctx.config.paths;

  const targets: Array<{ scope: Scope; dir: string }> = [];
  if ((await directoryExists(constitutionDir)) && countByScope(graph, "constitution") > 0) {
    targets.push({ scope: "constitution", dir: constitutionDir });
  }
  targets.push({ scope: "project", dir: projectDir });

  for (const { scope, dir } of targets) {
    const path = join(dir, "INDEX.md");
    await writeFileAtomic(path, renderIndex(graph, scope));
    ctx.io.out(`${relative(root, path)}: ${countByScope(graph, scope)} decisions`);
  }
  return 0;
}

async function cmdHealth(ctx: CliContext): Promise<number> {
  const graph = await ctx.service.loadGraph();
  const path = healthPath(ctx.config);

  let previous: string | undefined;
  try {
    previous = await readFile(path, "utf-8");
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }

  const { errors } = validate(graph, ctx.service.lintRules());
  const report = renderHealth({ graph, errorCount: errors.length, previous, today: ctx.service.today() });
  await writeFileAtomic(path, report.content);

  ctx.io.out(`HEALTH.md updated: ${graph.size} decisions, ${report.flaggedCount} flagged items`);
  return 0;
}

async function cmdCompileManifest(ctx: CliContext, args: string[]): Promise<number> {
  const parsed = parseArgs(args, ["--target"], ["--json"]);
  const rawTarget = parsed.values.get("--target");
  let target: ManifestTarget | undefined;
  if (rawTarget !== undefined) {
    if (!isManifestTarget(rawTarget)) {
      throw new UsageError(`--target must be 'human' or 'agent', got '${rawTarget}'`);
    }
    target = rawTarget;
  }

  const manifest = await ctx.service.manifest(target);
  const json = parsed.switches.has("--json");

  if (manifest.human) {
    if (json) printJson(ctx.io, manifest.human);
    else printAll(ctx.io, render.renderHumanManifest(manifest.human));
  }
  if (manifest.agent) {
    if (json) printJson(ctx.io, manifest.agent);
    else printAll(ctx.io, render.renderAgentManifest(manifest.agent));
  }
  return 0;
}

// =============================================================================
// Write commands
// =============================================================================

async function cmdCreate(ctx: CliContext, args: string[]): Promise<number> {
  const [id, ...rest] = args;
  if (!id) {
    throw new UsageError(
      'Usage: decigraph create DEC-NNN --title "..." --level N [--state suggested] [--stakes medium] ' +
        "[--depends-on DEC-001,DEC-003] [--constitution]",
    );
  }

  const parsed = parseArgs(rest, ["--title", "--level", "--state", "--stakes", "--depends-on"], ["--constitution"]);
  if (parsed.positionals.length > 0) throw new UsageError(`unexpected argument '${parsed.positionals[0]}'`);

  const title = parsed.values.get("--title");
  const rawLevel = parsed.values.get("--level");
  if (!title) throw new UsageError("--title is required");
  if (rawLevel === undefined) throw new UsageError("--level is required");

  const level = parseLevel(rawLevel);
  const state = parsed.values.get("--state") ?? "suggested";
  const partition: Scope = parsed.switches.has("--constitution") ? "constitution" : "project";
  const rawDeps = parsed.values.get("--depends-on");

  const result = await ctx.service.create(
    id,
    {
      title,
      level,
      state,
      stakes: parsed.values.get("--stakes"),
      depends_on: rawDeps === undefined ? [] : parseDependencyList(rawDeps),
    },
    partition,
  );

  if (!result.created) {
    printFindings(ctx.io, result.errors, result.warnings);
    return 1;
  }

  printFindings(ctx.io, [], result.warnings);
  const dir = partition === "constitution" ? ctx.config.paths.constitutionDir : ctx.config.paths.projectDir;
  ctx.io.out(`Created ${id} (level ${level}, ${state}) in ${relative(ctx.config.paths.root, dir) || "."}/`);
  return 0;
}

async function cmdSet(ctx: CliContext, args: string[]): Promise<number> {
  const [id, field, ...valueArgs] = args;
  if (!id || !field || valueArgs.length === 0) {
    throw new UsageError("Usage: decigraph set DEC-NNN field value");
  }

  const raw = field === "title" ? valueArgs.join(" ") : valueArgs[0];
  const result = await ctx.service.set(id, field, coerceSetValue(field, raw));

  if (!result.applied) {
    printFindings(ctx.io, result.errors, result.warnings);
    return 1;
  }

  printFindings(ctx.io, [], result.warnings);
  ctx.io.out(render.renderSetApplied(result));
  return 0;
}

async function cmdEdit(ctx: CliContext, args: string[]): Promise<number> {
  const [id, oldText, newText] = args;
  if (!id || oldText === undefined || newText === undefined) {
    throw new UsageError('Usage: decigraph edit DEC-NNN "old text" "new text"');
  }

  const result = await ctx.service.edit(id, oldText, newText);
  printAll(ctx.io, render.renderEdit(result));
  return result.new_errors.length > 0 ? 1 : 0;
}

// =============================================================================
// Scratchpad
// =============================================================================

async function cmdScratchpad(ctx: CliContext, args: string[]): Promise<number> {
  const [sub, ...rest] = args;
  switch (sub) {
    case "add": {
      const parsed = parseArgs(rest, ["--type", "--links"], []);
      const type = parsed.values.get("--type");
      const content = parsed.positionals.at(-1);
      if (!type) throw new UsageError("--type is required");
      if (!content) throw new UsageError("content string is required");

      const links = parseDependencyList(parsed.values.get("--links") ?? "");
      const entry = await ctx.scratchpad.add(type, content, links);
      ctx.io.out(render.renderScratchpadEntry(entry));
      return 0;
    }
    case "list": {
      const parsed = parseArgs(rest, ["--type"], ["--json"]);
      const listing = await ctx.scratchpad.list(parsed.values.get("--type"));
      if (parsed.switches.has("--json")) printJson(ctx.io, listing);
      else printAll(ctx.io, render.renderScratchpadList(listing));
      return 0;
    }
    case "mature": {
      const [spId, decisionId] = rest;
      if (!spId || !decisionId) throw new UsageError("Usage: decigraph scratchpad mature SP-NNN DEC-NNN");
      const entry = await ctx.scratchpad.mature(spId, decisionId);
      ctx.io.out(`Matured ${entry.id} [${entry.type}] → ${decisionId}`);
      return 0;
    }
    default:
      throw new UsageError("Usage: decigraph scratchpad {add|list|mature} ...");
  }
}

async function cmdScratchpadSummary(ctx: CliContext): Promise<number> {
  const summary = await ctx.scratchpad.summary();
  if (summary) ctx.io.out(`Scratchpad: ${summary}`);
  return 0;
}

// =============================================================================
// Dispatch
// =============================================================================

type Command = (ctx: CliContext, args: string[]) => Promise<number>;

const COMMANDS: Record<string, Command> = {
  validate: cmdValidate,
  cascade: cmdCascade,
  frontier: cmdFrontier,
  search: cmdSearch,
  index: cmdIndex,
  health: cmdHealth,
  "compile-manifest": cmdCompileManifest,
  create: cmdCreate,
  set: cmdSet,
  edit: cmdEdit,
  scratchpad: cmdScratchpad,
  "scratchpad-summary": cmdScratchpadSummary,
};

/**
 * Run one command. Domain errors become a message on stderr and exit
 * code 1; anything else propagates.
 */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  const [name, ...args] = argv;
  if (!name) {
    ctx.io.out(USAGE);
    return 1;
  }

  const command = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (!command) {
    ctx.io.out(`Unknown command: ${name}`);
    ctx.io.out(USAGE);
    return 1;
  }

  try {
    return await command(ctx, args);
  } catch (error) {
    if (error instanceof GraphLoadError) {
      ctx.io.err(`ERROR: ${error.message}`);
      return 1;
    }
    if (error instanceof DecisionGraphError) {
      ctx.io.err(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
