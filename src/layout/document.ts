// document.ts
import { z } from 'zod';

// [x, y, width, height] in full-frame pixels
const PixelBoxSchema = z.tuple([
  z.number().int().nonnegative(),
  z.number().int().nonnegative(),
  z.number().int().positive(),
  z.number().int().positive(),
]);

const ElementSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(['icon', 'region', 'text']),
  bbox: PixelBoxSchema,
  required: z.boolean().default(false),
  label: z.string().min(1).optional(),
  icon: z.string().min(1).optional(),
  region: z.string().min(1).optional(),
});

const ClickTaskSchema = z.object({
  id: z.string().min(1),
  element: z.string().min(1),
  action: z.enum(['left_click', 'double_click']),
  prompt: z.string().min(1),
});

/** The annotation document the layout-authoring tool exports. */
export const LayoutDocumentSchema = z.object({
  version: z.string().min(1),
  screen: z.object({
    name: z.string().min(1),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
  }),
  elements: z.array(ElementSchema).min(1),
  tasks: z.array(ClickTaskSchema).default([]),
  loadingIndicator: z.string().min(1).optional(),
});

export type LayoutDocument = z.infer<typeof LayoutDocumentSchema>;
export type LayoutDocumentInput = z.input<typeof LayoutDocumentSchema>;
