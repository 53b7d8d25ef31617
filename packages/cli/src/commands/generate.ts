import { Command } from 'commander';
import { CONFIG, runGenerate, validate } from '@servicescape/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { GenerateOptionsSchema } from '../utils/command-schemas.js';
import { ConsoleProgress, Logger } from '../utils/cli-helpers.js';
import { shutdown } from '../utils/signals.js';

export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Write D2 diagrams, SVG renders and a README for a schema document')
    .argument('<schema-file>', 'JSON document listing services and async edges')
    .option('-o, --output <dir>', 'Output directory', CONFIG.output.dir)
    .option('--title <title>', 'README title', CONFIG.output.title)
    .option('--global-name <name>', 'Cluster label for services without a system')
    .option('--no-render', 'Write D2 scripts only, skip the d2 renderer')
    .option('--layout <layout>', 'Layout engine (elk, dagre)')
    .option('--theme <id>', 'D2 theme id')
    .option('--pad <px>', 'Padding around each diagram in pixels')
    .option('--sketch', 'Render in hand-drawn sketch style')
    .option('--font <font>', 'Font (SourceSansPro, SourceCodePro, HandDrawn)')
    .action(async (schemaFile: string, options: unknown) => {
      try {
        const validated = validate(GenerateOptionsSchema, options, 'command options');
        const files = await runGenerate(
          {
            schemaPath: schemaFile,
            outputDir: validated.output,
            title: validated.title,
            globalName: validated.globalName,
            render: validated.render,
            d2: {
              layout: validated.layout,
              theme: validated.theme,
              pad: validated.pad,
              sketch: validated.sketch,
              font: validated.font,
            },
            signal: shutdown.signal,
          },
          new ConsoleProgress(CONFIG.debug.verbose)
        );
        Logger.success(`Generated ${String(files.length)} files`);
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
