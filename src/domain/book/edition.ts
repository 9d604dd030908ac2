import { z } from "zod";

/**
 * A paragraph list may nest arrays (sub-divisions the store does not model);
 * they are flattened in order on import.
 */
export type ParagraphList = Array<string | ParagraphList>;

/** Section content: either paragraphs, or further keyed sub-sections. */
export type SectionContent = ParagraphList | { [key: string]: SectionContent };

export const ParagraphListSchema: z.ZodType<ParagraphList> = z.lazy(() =>
  z.array(z.union([z.string(), ParagraphListSchema])),
);

export const SectionContentSchema: z.ZodType<SectionContent> = z.lazy(() =>
  z.union([ParagraphListSchema, z.record(z.string(), SectionContentSchema)]),
);

export type SchemaNode = {
  key?: string;
  enTitle?: string;
  heTitle?: string;
  title?: string;
  nodes?: SchemaNode[];
};

export const SchemaNodeSchema: z.ZodType<SchemaNode> = z.lazy(() =>
  z.object({
    key: z.string().optional(),
    enTitle: z.string().optional(),
    heTitle: z.string().optional(),
    title: z.string().optional(),
    nodes: z.array(SchemaNodeSchema).optional(),
  }),
);

export const BookEditionSchema = z.object({
  title: z.string().optional(),
  heTitle: z.string().optional(),
  schema: z
    .object({
      nodes: z.array(SchemaNodeSchema).default([]),
    })
    .default({}),
  text: z.record(z.string(), SectionContentSchema),
});

export type BookEdition = z.infer<typeof BookEditionSchema>;
