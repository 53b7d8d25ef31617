import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { formatDiagram, formatServiceSection, formatSystemsSection } from './readme-sections.js';
import type { DiagramLink, ServiceEntry, SystemEntry } from './readme-sections.js';
import { summarizeAsyncEdges } from '../diagrams/async-summary.js';
import { slugify } from '../diagrams/diagram-graph.js';
import { ErrorCode, ServicescapeError } from '../errors.js';
import { listSystems, loadSchemaFile, schemaWarnings } from '../model/schema-loader.js';
import { D2_TARGET_TYPE } from '../model/schema-types.js';
import type { RenderContext } from '../model/schema-types.js';
import type { D2OptionsInput } from '../schemas/d2-options.schema.js';
import { createD2Target } from '../target/d2-target.js';
import type { D2Target } from '../target/d2-target.js';
import { CONFIG } from '../utils/config.js';
import { loadTemplate } from '../utils/template-engine.js';

export const README_TEMPLATE_DIR = join(dirname(fileURLToPath(import.meta.url)), 'templates');

export interface GenerateOptions {
  schemaPath: string;
  outputDir?: string;
  title?: string;
  globalName?: string;
  /** Write scripts only when false. */
  render?: boolean;
  d2?: D2OptionsInput;
  signal?: AbortSignal;
  /** Prebuilt target; `d2` is ignored when set. */
  target?: D2Target;
}

class UniqueSlugs {
  private readonly used = new Set<string>();

  next(name: string): string {
    const base = slugify(name);
    let slug = base;
    for (let n = 2; this.used.has(slug); n++) slug = `${base}-${String(n)}`;
    this.used.add(slug);
    return slug;
  }
}

async function writeOutput(
  outputDir: string,
  relativePath: string,
  data: Buffer | string
): Promise<string> {
  const fullPath = join(outputDir, relativePath);
  try {
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, data);
  } catch (error) {
    throw new ServicescapeError(
      `Failed to write ${fullPath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.IO_WRITE_FAILED,
      `Could not write ${relativePath} to ${outputDir}`,
      { path: fullPath },
      false,
      error
    );
  }
  return fullPath;
}

/**
 * Writes the documentation bundle for one schema document: a D2 script (and
 * SVG unless rendering is off) per view, plus a README indexing them.
 * Returns every written path in write order.
 */
export async function runGenerate(
  options: GenerateOptions,
  progress?: ProgressReporter
): Promise<string[]> {
  const p = progress ?? new SilentProgress();
  const outputDir = options.outputDir ?? CONFIG.output.dir;
  const globalName = options.globalName ?? CONFIG.output.globalName;
  const render = options.render ?? true;
  const ctx: RenderContext = { signal: options.signal ?? new AbortController().signal };
  const written: string[] = [];

  p.section('Loading schema');
  p.start(`Reading ${options.schemaPath}`);
  const { schema, asyncEdges } = await loadSchemaFile(options.schemaPath);
  const systems = listSystems(schema);
  p.succeed(
    `Loaded ${String(schema.services.length)} services, ${String(systems.length)} systems, ${String(asyncEdges.length)} async edges`
  );
  for (const warning of schemaWarnings(schema, asyncEdges)) {
    p.warn(warning);
  }
  if (!render) {
    p.info('Rendering disabled, writing D2 scripts only');
  }

  const target = options.target ?? createD2Target(options.d2);
  const readme = loadTemplate(README_TEMPLATE_DIR, 'readme.md.tmpl');

  const emit = async (label: string, basePath: string, script: Buffer): Promise<DiagramLink> => {
    p.start(`Generating ${label}`);
    const scriptPath = `${basePath}.d2`;
    written.push(await writeOutput(outputDir, scriptPath, script));
    if (!render) {
      p.succeed(`Wrote ${scriptPath}`);
      return { script: scriptPath };
    }
    let svg: Buffer;
    try {
      svg = await target.renderSchema(ctx, { type: D2_TARGET_TYPE, data: script });
    } catch (error) {
      p.fail(`Rendering ${label} failed`);
      throw error;
    }
    const imagePath = `${basePath}.svg`;
    written.push(await writeOutput(outputDir, imagePath, svg));
    p.succeed(`Rendered ${imagePath}`);
    return { script: scriptPath, image: imagePath };
  };

  p.section('Generating diagrams');
  const overview = await emit(
    'overview diagram',
    'diagrams/overview',
    target.generateOverviewDiagramScript(schema, asyncEdges, globalName)
  );

  const systemSlugs = new UniqueSlugs();
  const systemEntries: SystemEntry[] = [];
  for (const system of systems) {
    const diagram = await emit(
      `${system} system diagram`,
      `diagrams/systems/${systemSlugs.next(system)}`,
      target.generateSystemDiagramScript(schema, system, asyncEdges)
    );
    systemEntries.push({
      name: system,
      diagram,
      services: schema.services.filter((s) => s.info.system === system).map((s) => s.info.name),
    });
  }

  const serviceNames = schema.services.map((s) => s.info.name);
  const serviceSlugs = new UniqueSlugs();
  const serviceEntries: ServiceEntry[] = [];
  for (const service of schema.services) {
    const diagram = await emit(
      `${service.info.name} relationships diagram`,
      `diagrams/services/${serviceSlugs.next(service.info.name)}`,
      target.generateServiceRelationshipsDiagramScript(service, schema.services, asyncEdges)
    );
    serviceEntries.push({
      service,
      diagram,
      asyncSummaries: summarizeAsyncEdges(service.info.name, asyncEdges, serviceNames),
    });
  }

  p.section('Writing documentation');
  const markdown = readme.render({
    title: options.title ?? CONFIG.output.title,
    serviceCount: String(schema.services.length),
    systemCount: String(systems.length),
    overview: formatDiagram('Service overview', overview),
    systems: formatSystemsSection(systemEntries),
    services:
      serviceEntries.length > 0
        ? serviceEntries.map(formatServiceSection).join('\n\n')
        : '_No services declared._',
  });
  written.push(await writeOutput(outputDir, 'README.md', markdown));
  p.succeed(`Wrote ${String(written.length)} files to ${outputDir}`);

  return written;
}
