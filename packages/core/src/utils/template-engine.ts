import { readFileSync } from 'fs';
import { join } from 'path';
import { ServicescapeError, ErrorCode } from '../errors.js';

const PLACEHOLDER = /\{\{\s*([\w.-]+)\s*\}\}/g;

type Segment = { literal: string } | { placeholder: string };

export type TemplateVariables = Record<string, string>;

/**
 * A template split into literal text and `{{name}}` placeholders once, so each
 * render is a single pass of string concatenation.
 */
export interface CompiledTemplate {
  readonly name: string;
  readonly placeholders: readonly string[];
  render(variables: TemplateVariables): string;
}

export function compileTemplate(name: string, source: string): CompiledTemplate {
  const segments: Segment[] = [];
  const placeholders: string[] = [];
  let cursor = 0;
  for (const match of source.matchAll(PLACEHOLDER)) {
    const [whole, key] = match;
    const index = match.index ?? cursor;
    if (!key) continue;
    if (index > cursor) segments.push({ literal: source.slice(cursor, index) });
    segments.push({ placeholder: key });
    if (!placeholders.includes(key)) placeholders.push(key);
    cursor = index + whole.length;
  }
  if (cursor < source.length) segments.push({ literal: source.slice(cursor) });

  return {
    name,
    placeholders,
    render(variables: TemplateVariables): string {
      let out = '';
      for (const segment of segments) {
        if ('literal' in segment) {
          out += segment.literal;
          continue;
        }
        const value = variables[segment.placeholder];
        if (value === undefined) {
          throw new ServicescapeError(
            `Template "${name}" has no value for {{${segment.placeholder}}}`,
            ErrorCode.TEMPLATE_EXPANSION_FAILED,
            `Could not expand template "${name}"`,
            { template: name, placeholder: segment.placeholder }
          );
        }
        out += value;
      }
      return out;
    },
  };
}

export function loadTemplate(directory: string, fileName: string): CompiledTemplate {
  const templatePath = join(directory, fileName);
  let source: string;
  try {
    source = readFileSync(templatePath, 'utf-8');
  } catch (error) {
    throw new ServicescapeError(
      `Failed to read template ${templatePath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.TEMPLATE_LOAD_FAILED,
      `Could not load template "${fileName}"`,
      { template: fileName, path: templatePath }
    );
  }
  return compileTemplate(fileName, source);
}
