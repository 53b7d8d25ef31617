import { Command } from 'commander';
import {
  CONFIG,
  ErrorCode,
  ServicescapeError,
  createD2Target,
  loadSchemaFile,
  validate,
} from '@servicescape/core';
import type { D2Target, LoadedSchema } from '@servicescape/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ScriptOptionsSchema } from '../utils/command-schemas.js';
import type { ScriptCommandOptions } from '../utils/command-schemas.js';

export function generateScript(
  target: D2Target,
  { schema, asyncEdges }: LoadedSchema,
  options: ScriptCommandOptions
): Buffer {
  switch (options.view) {
    case 'overview':
      return target.generateOverviewDiagramScript(
        schema,
        asyncEdges,
        options.globalName ?? CONFIG.output.globalName
      );
    case 'service-relationships': {
      const service = schema.services.find((s) => s.info.name === options.service);
      if (!service) {
        throw new ServicescapeError(
          `Service not found: ${options.service ?? ''}`,
          ErrorCode.INPUT_INVALID,
          `No service named "${options.service ?? ''}" in the schema`,
          { service: options.service }
        );
      }
      return target.generateServiceRelationshipsDiagramScript(service, schema.services, asyncEdges);
    }
    case 'system':
      return target.generateSystemDiagramScript(schema, options.system ?? '', asyncEdges);
  }
}

export function createScriptCommand(): Command {
  return new Command('script')
    .description('Print the D2 script of one view to stdout')
    .argument('<view>', 'overview, service-relationships or system')
    .argument('<schema-file>', 'JSON document listing services and async edges')
    .option('--service <name>', 'Focal service for the service-relationships view')
    .option('--system <name>', 'System for the system view')
    .option('--global-name <name>', 'Cluster label for services without a system')
    .action(async (view: string, schemaFile: string, options: Record<string, unknown>) => {
      try {
        const validated = validate(ScriptOptionsSchema, { ...options, view }, 'command options');
        const loaded = await loadSchemaFile(schemaFile);
        process.stdout.write(generateScript(createD2Target(), loaded, validated));
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
