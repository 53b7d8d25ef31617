import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { CONFIG, D2_FONTS, D2_LAYOUTS } from '../utils/config.js';

export const D2OptionsSchema = z
  .object({
    pad: z.number().int().min(0),
    theme: z.number().int(),
    sketch: z.boolean(),
    font: z.enum(D2_FONTS),
    layout: z.enum(D2_LAYOUTS),
  })
  .strict();

export type D2Options = z.infer<typeof D2OptionsSchema>;

/** Partial overrides as accepted from callers; missing keys fall back to CONFIG. */
export type D2OptionsInput = Partial<Record<keyof D2Options, unknown>>;

export function defaultD2Options(): D2Options {
  return {
    pad: CONFIG.d2.pad,
    theme: CONFIG.d2.theme,
    sketch: CONFIG.d2.sketch,
    font: CONFIG.d2.font,
    layout: CONFIG.d2.layout,
  };
}

export function parseD2Options(
  input: D2OptionsInput = {},
  defaults: D2Options = defaultD2Options()
): D2Options {
  const defined = Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined)
  );
  const result = D2OptionsSchema.safeParse({ ...defaults, ...defined });
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const key = issue?.path.map(String).join('.') ?? '';
  throw new ConfigurationError(
    `Invalid D2 option ${key || '(root)'}: ${issue?.message ?? 'malformed value'}`,
    key ? `d2.${key}` : 'd2'
  );
}
