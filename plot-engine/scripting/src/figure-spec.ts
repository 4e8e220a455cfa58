import { z } from 'zod';
import { PATHS, resolvePath } from '../../../config/paths.js';
import type { RendererConfig } from '../../../renderer.config.js';
import { SAVE_FORMATS, TOOLKITS, type FigureSpec } from '../../../types.js';
import { TOOLKIT_PROFILES, type ToolkitRegistry } from '../../toolkits/src/registry.js';

/**
 * Request validation schema for raw figure requests
 */
export const FigureRequestSchema = z.object({
  toolkit: z.enum(TOOLKITS),
  script: z.string(),
  saveFormat: z.enum(SAVE_FORMATS).optional(),
  directory: z.string().min(1).optional(),
  dpi: z.number().int().min(1).max(2400).optional(),
  extraAttrs: z.record(z.string()).default({}),
  blockAttrs: z.object({
    id: z.string().default(''),
    classes: z.array(z.string()).default([]),
    attributes: z.record(z.string()).default({})
  }).default({}),
  caption: z.string().default(''),
  withSource: z.boolean().default(false)
});

export type FigureRequest = z.input<typeof FigureRequestSchema>;

/**
 * Validate a raw request and fill in defaults from the configuration.
 * Throws a ZodError on malformed input or a save format the toolkit
 * cannot produce.
 */
export function parseFigureSpec(
  input: unknown,
  config: RendererConfig,
  registry: ToolkitRegistry = TOOLKIT_PROFILES
): FigureSpec {
  const request = FigureRequestSchema
    .superRefine((value, ctx) => {
      const format = value.saveFormat ?? config.defaultSaveFormat;
      const profile = registry[value.toolkit];
      if (!profile) return;
      if (!profile.supportedSaveFormats.includes(format)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['saveFormat'],
          message: `${profile.displayName} cannot save figures as ${format}; supported: ${profile.supportedSaveFormats.join(', ')}`
        });
      }
    })
    .parse(input);

  return Object.freeze({
    toolkit: request.toolkit,
    script: request.script,
    saveFormat: request.saveFormat ?? config.defaultSaveFormat,
    directory: request.directory ?? resolvePath(PATHS.FIGURE_DIR),
    dpi: request.dpi ?? config.defaultDpi,
    extraAttrs: Object.freeze({ ...request.extraAttrs }),
    blockAttrs: Object.freeze(request.blockAttrs),
    caption: request.caption,
    withSource: request.withSource
  });
}
