import { z } from 'zod';

/**
 * Scanned file record produced by the scanner.
 */
export const ScannedFileSchema = z.object({
  id: z.string(),
  filename: z.string(),
  path: z.string(),
  extension: z.string(),
  size: z.number().int().nonnegative(),
  createdAt: z.number(),
  modifiedAt: z.number(),
  relativePath: z.string().optional(),
  parentFolder: z.string().nullable().optional(),
});

export type ScannedFile = z.infer<typeof ScannedFileSchema>;

export const AssignmentSourceSchema = z.enum(['filename', 'content', 'user', 'memory', 'graphRAG']);
export type AssignmentSource = z.infer<typeof AssignmentSourceSchema>;

export const RefinementStateSchema = z.enum(['initial', 'refining', 'refined', 'userEdited']);
export type RefinementState = z.infer<typeof RefinementStateSchema>;

export const FileAssignmentSchema = z.object({
  id: z.string(),
  fileId: z.string(),
  categoryId: z.string(),
  path: z.string(),
  filename: z.string(),
  confidence: z.number().min(0).max(1),
  needsDeepAnalysis: z.boolean(),
  source: AssignmentSourceSchema,
  assignedAt: z.number(),
});

export type FileAssignment = Readonly<z.infer<typeof FileAssignmentSchema>>;

export const TaxonomyNodeSnapshotSchema = z.object({
  id: z.string(),
  name: z.string(),
  suggestedName: z.string().nullable(),
  parentId: z.string().nullable(),
  childIds: z.array(z.string()),
  assignedFiles: z.array(FileAssignmentSchema),
  confidence: z.number().min(0).max(1),
  isUserCreated: z.boolean(),
  refinementState: RefinementStateSchema,
  createdAt: z.number(),
});

export type TaxonomyNodeSnapshot = z.infer<typeof TaxonomyNodeSnapshotSchema>;

export const TaxonomyTreeSnapshotSchema = z.object({
  id: z.string(),
  rootId: z.string(),
  createdAt: z.number(),
  modifiedAt: z.number(),
  sourceFolderName: z.string().nullable(),
  isVerified: z.boolean(),
  nodes: z.array(TaxonomyNodeSnapshotSchema),
});

export type TaxonomyTreeSnapshot = z.infer<typeof TaxonomyTreeSnapshotSchema>;

/**
 * Read-only view of a category. Mutation goes through TaxonomyTree.
 */
export interface TaxonomyNode {
  readonly id: string;
  readonly name: string;
  readonly suggestedName: string | null;
  readonly parentId: string | null;
  readonly childIds: readonly string[];
  readonly assignedFiles: readonly FileAssignment[];
  readonly confidence: number;
  readonly isUserCreated: boolean;
  readonly refinementState: RefinementState;
  readonly createdAt: number;
}

export function isUserEdited(node: TaxonomyNode): boolean {
  return node.refinementState === 'userEdited';
}

/**
 * Minimal description of a file being placed in the tree.
 */
export interface FileRef {
  fileId: string;
  path: string;
  filename: string;
}

export function fileRefFromScanned(file: ScannedFile): FileRef {
  return { fileId: file.id, path: file.path, filename: file.filename };
}
