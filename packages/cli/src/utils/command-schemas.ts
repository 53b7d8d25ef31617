import { z } from 'zod';
import { D2_FONTS, D2_LAYOUTS, DIAGRAM_VIEWS } from '@servicescape/core';

// commander hands numeric options over as strings
const IntegerStringSchema = z
  .union([z.number(), z.string().regex(/^-?\d+$/, 'Expected an integer')])
  .transform((val) => (typeof val === 'number' ? val : parseInt(val, 10)))
  .pipe(z.number().int());

export const GenerateOptionsSchema = z.object({
  output: z.string().min(1).optional(),
  title: z.string().min(1).optional(),
  globalName: z.string().min(1).optional(),
  render: z.boolean().default(true),
  layout: z.enum(D2_LAYOUTS).optional(),
  theme: IntegerStringSchema.optional(),
  pad: IntegerStringSchema.pipe(z.number().min(0)).optional(),
  sketch: z.boolean().optional(),
  font: z.enum(D2_FONTS).optional(),
});
export type GenerateCommandOptions = z.infer<typeof GenerateOptionsSchema>;

export const DiagramViewSchema = z.enum(DIAGRAM_VIEWS);

export const ScriptOptionsSchema = z
  .object({
    view: DiagramViewSchema,
    service: z.string().min(1).optional(),
    system: z.string().min(1).optional(),
    globalName: z.string().min(1).optional(),
  })
  .superRefine((data, ctx) => {
    if (data.view === 'service-relationships' && !data.service) {
      ctx.addIssue({
        code: 'custom',
        message: '--service is required for the service-relationships view',
        path: ['service'],
      });
    }
    if (data.view === 'system' && !data.system) {
      ctx.addIssue({
        code: 'custom',
        message: '--system is required for the system view',
        path: ['system'],
      });
    }
  });
export type ScriptCommandOptions = z.infer<typeof ScriptOptionsSchema>;
