import { z } from 'zod';

// ============================================================
// Provider wire formats (submit + poll)
// ============================================================

export const SubmitResponseSchema = z.object({
  success: z.boolean().nullish(),
  request_id: z.string().nullish(),
  request_check_url: z.string().nullish(),
  error: z.string().nullish(),
});

export const PollStatusSchema = z.object({
  status: z.string(),
  success: z.boolean().nullish(),
  error: z.string().nullish(),
  page_count: z.number().int().nonnegative().nullish(),
});

export const WireTextLineSchema = z.object({
  text: z.string().nullish(),
  confidence: z.number().nullish(),
  bbox: z.array(z.number()).nullish(),
  polygon: z.array(z.array(z.number())).nullish(),
});

export const WirePageSchema = z.object({
  page: z.number().int().nullish(),
  text_lines: z.array(WireTextLineSchema).nullish(),
});

export const LinePollResponseSchema = PollStatusSchema.extend({
  pages: z.array(WirePageSchema).nullish(),
});

export interface StructureBlock {
  block_type?: string | null;
  html?: string | null;
  bbox?: number[] | null;
  polygon?: number[][] | null;
  children?: StructureBlock[] | null;
}

export const StructureBlockSchema: z.ZodType<StructureBlock> = z.lazy(() =>
  z.object({
    block_type: z.string().nullish(),
    html: z.string().nullish(),
    bbox: z.array(z.number()).nullish(),
    polygon: z.array(z.array(z.number())).nullish(),
    children: z.array(StructureBlockSchema).nullish(),
  })
);

export const StructurePollResponseSchema = PollStatusSchema.extend({
  json: StructureBlockSchema.nullish(),
});

export type WirePage = z.infer<typeof WirePageSchema>;
