// src/Scorer.ts
// Weighted score over numeric signal fields, configured in YAML.
//
// Each input names a `namespace.field`, a weight, bounds and a distribution.
// A value is clamped to its bounds, flipped if smaller is better, normalized
// to [0, 1] through the distribution, and the score is the weighted mean over
// the inputs that had a value.

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';

import { ConfigurationError } from './errors';
import { columnName } from './SignalWriter';
import type { SignalSet } from './signal';

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '..', 'config', 'scorer', 'default.yml');

const distributionSchema = z.enum(['linear', 'zapfian']);

export type Distribution = z.infer<typeof distributionSchema>;

const inputSchema = z
  .object({
    field: z.string().regex(/^[a-z0-9_]+\.[a-z0-9_]+$/, 'field must be "namespace.field"'),
    weight: z.number().positive(),
    bounds: z
      .object({
        lower: z.number().default(0),
        upper: z.number(),
        smaller_is_better: z.boolean().default(false),
      })
      .refine((bounds) => bounds.upper > bounds.lower, 'bounds.upper must be greater than bounds.lower'),
    distribution: distributionSchema.default('linear'),
  })
  .strict();

const scorerConfigSchema = z
  .object({
    name: z.string().min(1).optional(),
    inputs: z.array(inputSchema).min(1),
  })
  .strict();

export type ScorerInput = z.infer<typeof inputSchema>;
export type ScorerConfig = z.infer<typeof scorerConfigSchema>;

const DISTRIBUTIONS: Record<Distribution, (x: number) => number> = {
  linear: (x) => x,
  zapfian: (x) => Math.log1p(x),
};

/** `config/scorer/heavy_weights.yml` gives `heavy_weights_score`. */
export function nameFromFilepath(filePath: string): string {
  const base = path.basename(filePath, path.extname(filePath));
  return `${base.replace(/[^a-zA-Z0-9_]/g, '_')}_score`;
}

export function normalize(value: number, input: ScorerInput): number {
  const { lower, upper, smaller_is_better: smallerIsBetter } = input.bounds;
  let v = Math.min(Math.max(value, lower), upper);
  if (smallerIsBetter) {
    v = upper - (v - lower);
  }
  const d = DISTRIBUTIONS[input.distribution];
  return d(v - lower) / d(upper - lower);
}

export class Scorer {
  private constructor(
    readonly name: string,
    readonly inputs: readonly ScorerInput[]
  ) {}

  /** Parses and validates a YAML scorer config. */
  static fromConfig(name: string, source: string): Scorer {
    let parsed: unknown;
    try {
      parsed = yaml.parse(source);
    } catch (error) {
      throw new ConfigurationError(`scorer config "${name}" is not valid YAML`, { cause: error });
    }
    const result = scorerConfigSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new ConfigurationError(`scorer config "${name}" is invalid: ${issues}`, { cause: result.error });
    }
    return new Scorer(result.data.name ?? name, result.data.inputs);
  }

  static async fromFile(filePath: string): Promise<Scorer> {
    let source: string;
    try {
      source = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`cannot read scorer config ${filePath}`, { cause: error });
    }
    return Scorer.fromConfig(nameFromFilepath(filePath), source);
  }

  static fromDefaultConfig(): Promise<Scorer> {
    return Scorer.fromFile(DEFAULT_CONFIG_PATH);
  }

  /**
   * Non-numeric and unset fields do not contribute. With no contributing
   * input the score is 0.
   */
  score(sets: readonly SignalSet[]): number {
    const values = new Map<string, number>();
    for (const set of sets) {
      for (const field of set.fields()) {
        if (typeof field.value === 'number') {
          values.set(columnName(set.namespace, field.name), field.value);
        }
      }
    }

    let weighted = 0;
    let totalWeight = 0;
    for (const input of this.inputs) {
      const value = values.get(input.field);
      if (value === undefined) {
        continue;
      }
      weighted += input.weight * normalize(value, input);
      totalWeight += input.weight;
    }
    return totalWeight === 0 ? 0 : weighted / totalWeight;
  }
}

export function formatScore(score: number): string {
  return score.toFixed(5);
}
