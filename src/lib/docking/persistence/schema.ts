import { z } from 'zod';
import { DEFAULT_PANEL_MARGIN } from '../dock/DockPanel';

export const LAYOUT_FORMAT_VERSION = 1;

export const rectSchema = z.object({
    x: z.number(),
    y: z.number(),
    width: z.number().nonnegative(),
    height: z.number().nonnegative(),
});

export const widgetRecordSchema = z.object({
    type: z.literal('widget'),
    id: z.string().min(1),
    title: z.string().optional(),
    margin: z.number().nonnegative().default(DEFAULT_PANEL_MARGIN),
    internalState: z.unknown().optional(),
});

export const tabGroupRecordSchema = z.object({
    type: z.literal('tabgroup'),
    selected: z.number().int().optional(),
    children: z.array(widgetRecordSchema),
});

export type WidgetRecord = z.infer<typeof widgetRecordSchema>;
export type TabGroupRecord = z.infer<typeof tabGroupRecordSchema>;

export interface SplitterRecord {
    type: 'splitter';
    orientation: 'horizontal' | 'vertical';
    sizes: number[];
    children: PaneRecord[];
}

export type PaneRecord = TabGroupRecord | SplitterRecord;

/** Input side of a widget record: `margin` may be left out. */
type WidgetRecordInput = z.input<typeof widgetRecordSchema>;
type PaneRecordInput =
    | { type: 'tabgroup'; selected?: number; children: WidgetRecordInput[] }
    | { type: 'splitter'; orientation: 'horizontal' | 'vertical'; sizes?: number[]; children: PaneRecordInput[] };

export const splitterRecordSchema: z.ZodType<SplitterRecord, z.ZodTypeDef, Extract<PaneRecordInput, { type: 'splitter' }>> =
    z.lazy(() =>
        z.object({
            type: z.literal('splitter'),
            orientation: z.enum(['horizontal', 'vertical']),
            sizes: z.array(z.number()).default([]),
            children: z.array(paneRecordSchema),
        }),
    );

export const paneRecordSchema: z.ZodType<PaneRecord, z.ZodTypeDef, PaneRecordInput> = z.lazy(() =>
    z.union([tabGroupRecordSchema, splitterRecordSchema]),
);

export const windowRecordSchema = z.object({
    kind: z.enum(['main', 'root', 'container', 'panel']),
    title: z.string().optional(),
    geometry: rectSchema,
    maximized: z.boolean().default(false),
    normalGeometry: rectSchema.nullable().default(null),
    isMainWindow: z.boolean().default(false),
    isPersistentRoot: z.boolean().default(false),
    content: paneRecordSchema,
});

export type WindowRecord = z.infer<typeof windowRecordSchema>;

/** Windows are validated one at a time so a bad record only loses that window. */
export const layoutDocumentSchema = z.object({
    version: z.number().int(),
    windows: z.array(z.unknown()),
});

export interface LayoutDocument {
    version: number;
    windows: WindowRecord[];
}
