/**
 * Catalog Protocol Schemas
 *
 * Zod validation schemas for catalog documents and bridge messages.
 * Used for runtime validation of anything read from disk or stdin.
 */

import { z } from "zod";

// ============================================================
// Catalog documents
// ============================================================

export const PreconditionSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("command-exists"),
    value: z.string().min(1),
  }),
  z.object({
    kind: z.literal("file-exists"),
    value: z.string().min(1),
  }),
  z.object({
    kind: z.literal("env-equals"),
    name: z.string().min(1),
    value: z.string(),
  }),
]);

export type Precondition = z.infer<typeof PreconditionSchema>;

export const ScriptSpecSchema = z.object({
  /** Relative to the catalog document's directory */
  file: z.string().min(1),
  executable: z.string().min(1).default("sh"),
  args: z.array(z.string()).optional(),
});

export type ScriptSpec = z.infer<typeof ScriptSpecSchema>;
export type ScriptSpecInput = z.input<typeof ScriptSpecSchema>;

/**
 * Task lists are written either as an array or as one space-separated string
 */
export const TaskListSchema = z
  .union([z.array(z.string()), z.string()])
  .optional()
  .transform((value) => {
    if (value === undefined) return [];
    const tags = typeof value === "string" ? value.split(/\s+/) : value;
    return tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0);
  });

export interface CatalogEntry {
  id?: string;
  name: string;
  description: string;
  taskList: string[];
  multiSelect: boolean;
  command?: string;
  script?: ScriptSpec;
  preconditions: Precondition[];
  entries?: CatalogEntry[];
}

export interface CatalogEntryInput {
  id?: string;
  name: string;
  description?: string;
  taskList?: string | string[];
  multiSelect?: boolean;
  command?: string;
  script?: ScriptSpecInput;
  preconditions?: Precondition[];
  entries?: CatalogEntryInput[];
}

export const CatalogEntrySchema: z.ZodType<
  CatalogEntry,
  z.ZodTypeDef,
  CatalogEntryInput
> = z.lazy(() =>
  z
    .object({
      id: z.string().min(1).optional(),
      name: z.string().min(1),
      description: z.string().default(""),
      taskList: TaskListSchema,
      multiSelect: z.boolean().default(false),
      command: z.string().min(1).optional(),
      script: ScriptSpecSchema.optional(),
      preconditions: z.array(PreconditionSchema).default([]),
      entries: z.array(CatalogEntrySchema).optional(),
    })
    .refine(
      (entry) =>
        [entry.entries, entry.command, entry.script].filter(
          (part) => part !== undefined,
        ).length <= 1,
      {
        message: "An entry may define only one of entries, command or script",
      },
    ),
);

export const CatalogCategorySchema = z.object({
  name: z.string().min(1),
  entries: z.array(CatalogEntrySchema).default([]),
});

export const CatalogDocumentSchema = z.object({
  categories: z.array(CatalogCategorySchema),
});

export type CatalogCategoryDocument = z.infer<typeof CatalogCategorySchema>;
export type CatalogDocument = z.infer<typeof CatalogDocumentSchema>;

// ============================================================
// Bridge messages
// ============================================================

export const RpcRequestSchema = z.object({
  id: z.string().min(1),
  type: z.enum(["query", "mutation"]),
  path: z.array(z.string()).min(1),
  input: z.unknown().optional(),
});

export const BusyIndicatorModeSchema = z.enum(["pending", "first-result"]);
