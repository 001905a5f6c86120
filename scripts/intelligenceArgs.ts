/**
 * Argument parsing for the intelligence CLIs.
 * Pure functions over argv - no filesystem or network - suitable for unit testing.
 */

import { z } from "zod";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** `--name value` pairs and bare `--flag`s; anything else is positional. */
export function readFlags(args: string[]): { flags: Map<string, string | true>; positionals: string[] } {
  const flags = new Map<string, string | true>();
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const next = args[i + 1];
      if (next != null && !next.startsWith("--")) {
        flags.set(arg.slice(2), next);
        i++;
      } else {
        flags.set(arg.slice(2), true);
      }
    } else {
      positionals.push(arg);
    }
  }
  return { flags, positionals };
}

function stringFlag(flags: Map<string, string | true>, name: string): string | undefined {
  const v = flags.get(name);
  return typeof v === "string" ? v : undefined;
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new UsageError(issue ? `--${issue.path.join(".")}: ${issue.message}` : "Invalid arguments");
  }
  return result.data;
}

const CalibrateArgsSchema = z.object({
  model: z.string().min(1).optional(),
  category: z.string().min(1).default("general"),
  prompt: z.string().min(1).optional(),
  threshold: z.coerce.number().min(0).max(1).optional(),
  timeout: z.coerce.number().int().positive().optional(),
  json: z.boolean(),
});

export type CalibrateArgs = z.infer<typeof CalibrateArgsSchema>;

export function parseCalibrateArgs(args: string[]): CalibrateArgs {
  const { flags } = readFlags(args);
  return validate(CalibrateArgsSchema, {
    model: stringFlag(flags, "model"),
    category: stringFlag(flags, "category"),
    prompt: stringFlag(flags, "prompt"),
    threshold: stringFlag(flags, "threshold"),
    timeout: stringFlag(flags, "timeout"),
    json: flags.has("json"),
  });
}

const CompareArgsSchema = z.object({
  prompt: z.string().min(1, "a prompt is required"),
  system: z.string().min(1).optional(),
  models: z.array(z.string().min(1)).optional(),
  policy: z.enum(["speed", "quality", "balanced"]).default("balanced"),
  category: z.string().min(1).optional(),
  json: z.boolean(),
});

export type CompareArgs = z.infer<typeof CompareArgsSchema>;

/** Prompt from --prompt or the positional words; models as a comma list. */
export function parseCompareArgs(args: string[]): CompareArgs {
  const { flags, positionals } = readFlags(args);
  const models = stringFlag(flags, "models")
    ?.split(",")
    .map((m) => m.trim())
    .filter(Boolean);
  return validate(CompareArgsSchema, {
    prompt: stringFlag(flags, "prompt") ?? positionals.join(" "),
    system: stringFlag(flags, "system"),
    models: models && models.length > 0 ? models : undefined,
    policy: stringFlag(flags, "policy"),
    category: stringFlag(flags, "category"),
    json: flags.has("json"),
  });
}

const TriggerArgsSchema = z.object({
  window: z.coerce.number().int().positive().optional(),
  threshold: z.coerce.number().int().positive().optional(),
  manual: z.string().min(1).optional(),
  type: z.string().min(1).default("manual"),
  confidence: z.coerce.number().min(0).max(1).optional(),
  all: z.boolean(),
  deactivate: z.coerce.number().int().positive().optional(),
  json: z.boolean(),
});

export type TriggerArgs = z.infer<typeof TriggerArgsSchema>;

export function parseTriggerArgs(args: string[]): TriggerArgs {
  const { flags } = readFlags(args);
  return validate(TriggerArgsSchema, {
    window: stringFlag(flags, "window"),
    threshold: stringFlag(flags, "threshold"),
    manual: stringFlag(flags, "manual"),
    type: stringFlag(flags, "type"),
    confidence: stringFlag(flags, "confidence"),
    all: flags.has("all"),
    deactivate: stringFlag(flags, "deactivate"),
    json: flags.has("json"),
  });
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}
