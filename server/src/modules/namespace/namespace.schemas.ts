import { z } from "zod";
import type { FileNode, FolderNode, NamespaceState, RecycleBinEntry } from "../../types/namespace";

export const FileNodeSchema: z.ZodType<FileNode> = z.object({
  name: z.string().min(1),
  type: z.literal("file"),
  author: z.string(),
  fileType: z.string(),
  tags: z.array(z.string()),
  createdDate: z.string()
});

export const FolderNodeSchema: z.ZodType<FolderNode> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    type: z.literal("folder"),
    children: z.array(FolderNodeSchema),
    files: z.array(FileNodeSchema)
  })
);

export const RecycleBinEntrySchema: z.ZodType<RecycleBinEntry> = z.object({
  id: z.string().min(1),
  item: z.union([FolderNodeSchema, FileNodeSchema]),
  originalPath: z.string().min(1),
  sequence: z.number().int().nonnegative(),
  deletedAt: z.string()
});

export const NamespaceStateSchema: z.ZodType<NamespaceState> = z.object({
  root: FolderNodeSchema,
  recycleBin: z.array(RecycleBinEntrySchema),
  sequence: z.number().int().nonnegative()
});

// Request bodies use the snake_case field names of the HTTP surface.

const requiredName = z.string().trim().min(1);

export const FolderBodySchema = z.object({
  parent_path: requiredName,
  folder_name: z.string()
});

const tagsInput = z.union([z.string(), z.array(z.string())]);

export const AddFileBodySchema = z.object({
  parent_path: requiredName,
  file_name: z.string(),
  author: z.string().optional(),
  tags: tagsInput.optional(),
  file_type: z.string().optional()
});

export const FileBodySchema = z.object({
  parent_path: requiredName,
  file_name: z.string()
});

export const LookupQuerySchema = FileBodySchema;

export const SearchBodySchema = z.object({
  name: z.string().optional(),
  author: z.string().optional(),
  tags: tagsInput.optional(),
  file_type: z.string().optional()
});

// Positions arrive as JSON numbers or as digit strings from form posts.
const binIndex = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, "Expected an integer")
    .transform((value) => Number.parseInt(value, 10))
]);

export const BinRefBodySchema = z.union([
  z.object({ id: z.string().trim().min(1) }),
  z.object({ index: binIndex })
]);

export const TreeQuerySchema = z.object({
  sort: z.enum(["name", "insertion"]).optional()
});

export type BinRefBody = z.infer<typeof BinRefBodySchema>;
