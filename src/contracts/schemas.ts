import { z } from 'zod'
import type { Marker } from './types'

// Markers
export const MarkerSchema: z.ZodType<Marker> = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('SearchResult'),
    id: z.string(),
    description: z.string().optional(),
  }),
  z.object({
    kind: z.literal('ErrorMarkup'),
    id: z.string(),
    detail: z.string(),
  }),
  z.object({
    kind: z.literal('Generated'),
    id: z.string(),
  }),
  z.object({
    kind: z.literal('Other'),
    id: z.string(),
    name: z.string().optional(),
  }),
])

// Trees arrive with optional fields; normalizeTree fills them in
export interface TreeNodeInput {
  prefix?: string
  text?: string
  markers?: Marker[]
  children?: TreeNodeInput[]
}

export const TreeNodeInputSchema: z.ZodType<TreeNodeInput> = z.lazy(() =>
  z.object({
    prefix: z.string().optional(),
    text: z.string().optional(),
    markers: z.array(MarkerSchema).optional(),
    children: z.array(TreeNodeInputSchema).optional(),
  })
)

export const SourceSnapshotInputSchema = z.object({
  sourcePath: z.string().min(1),
  tree: TreeNodeInputSchema,
})

export const RecipeOptionSchema = z.object({
  name: z.string(),
  value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
})

export interface RecipeDescriptorInput {
  name: string
  displayName?: string
  options?: Array<z.infer<typeof RecipeOptionSchema>>
  recipeList?: RecipeDescriptorInput[]
}

export const RecipeDescriptorInputSchema: z.ZodType<RecipeDescriptorInput> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    displayName: z.string().optional(),
    options: z.array(RecipeOptionSchema).optional(),
    recipeList: z.array(RecipeDescriptorInputSchema).optional(),
  })
)

export const TransformationResultInputSchema = z.object({
  before: SourceSnapshotInputSchema.nullable().default(null),
  after: SourceSnapshotInputSchema.nullable().default(null),
  // Names into the document's recipe catalog
  recipes: z.array(z.string()).default([]),
})

export const ProjectNodeInputSchema = z.object({
  id: z.string().min(1),
  baseDir: z.string().nullable().default(null),
  parent: z.string().nullable().default(null),
})

export const BuildSessionInputSchema = z.object({
  executionRoot: z.string().nullable().default(null),
  localRepository: z.string(),
  projects: z.array(ProjectNodeInputSchema).default([]),
})

export const ReconcileInputSchema = z.object({
  session: BuildSessionInputSchema,
  activeRecipes: z.array(z.string()).default([]),
  recipes: z.array(RecipeDescriptorInputSchema).default([]),
  results: z.array(TransformationResultInputSchema).default([]),
})

export type ReconcileInput = z.infer<typeof ReconcileInputSchema>
export type TransformationResultInput = z.infer<typeof TransformationResultInputSchema>
export type BuildSessionInput = z.infer<typeof BuildSessionInputSchema>

// Config schema
export const ReconcileConfigSchema = z.object({
  activeRecipes: z.array(z.string()).default([]),
  localRepository: z.string().optional(),
  failOnInvalidActiveRecipes: z.boolean().default(false),
  cleanEmptyDirectories: z.boolean().default(true),
  reportOutputDirectory: z.string().default('target/rewrite'),
  diff: z.object({
    contextLines: z.number().int().min(0).default(3),
  }).default({
    contextLines: 3,
  }),
})

