import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { compileTemplate, loadTemplate } from '../template-engine.js';
import { ServicescapeError, ErrorCode } from '../../errors.js';

describe('compileTemplate', () => {
  it('substitutes every occurrence of a placeholder', () => {
    const template = compileTemplate('greeting', 'Hello {{ name }}, bye {{name}}!');
    expect(template.render({ name: 'Shop' })).toBe('Hello Shop, bye Shop!');
  });

  it('lists distinct placeholders in order of appearance', () => {
    const template = compileTemplate('t', '{{nodes}}\n{{edges}}\n{{nodes}}');
    expect(template.placeholders).toEqual(['nodes', 'edges']);
  });

  it('returns literal text unchanged', () => {
    expect(compileTemplate('plain', 'direction: right\n').render({})).toBe('direction: right\n');
  });

  it('inserts values verbatim, including braces', () => {
    const template = compileTemplate('t', 'a {{value}} b');
    expect(template.render({ value: '{{other}}' })).toBe('a {{other}} b');
  });

  it('ignores variables the template does not use', () => {
    const template = compileTemplate('t', '{{edges}}');
    expect(template.render({ edges: 'a -> b', clusters: 'unused' })).toBe('a -> b');
  });

  it('throws TEMPLATE_EXPANSION_FAILED for a missing value', () => {
    const template = compileTemplate('overview.d2.tmpl', '{{clusters}}\n{{edges}}');
    try {
      template.render({ clusters: '' });
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ServicescapeError);
      const err = error as ServicescapeError;
      expect(err.code).toBe(ErrorCode.TEMPLATE_EXPANSION_FAILED);
      expect(err.message).toBe('Template "overview.d2.tmpl" has no value for {{edges}}');
      expect(err.context['placeholder']).toBe('edges');
    }
  });
});

describe('loadTemplate', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'servicescape-templates-'));
    writeFileSync(join(dir, 'note.tmpl'), '# {{title}}\n');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads and compiles a template file', () => {
    const template = loadTemplate(dir, 'note.tmpl');
    expect(template.name).toBe('note.tmpl');
    expect(template.render({ title: 'Architecture' })).toBe('# Architecture\n');
  });

  it('throws TEMPLATE_LOAD_FAILED for a missing file', () => {
    try {
      loadTemplate(dir, 'missing.tmpl');
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ServicescapeError);
      const err = error as ServicescapeError;
      expect(err.code).toBe(ErrorCode.TEMPLATE_LOAD_FAILED);
      expect(err.context['path']).toBe(join(dir, 'missing.tmpl'));
    }
  });
});
