import { z } from 'zod';

// Only the parts of each Azure DevOps payload the proxy reads; unknown keys are dropped.

export const IdentityRefSchema = z.object({
  id: z.string().optional(),
  displayName: z.string().optional(),
  uniqueName: z.string().optional(),
});

/** Identity fields come back as an IdentityRef object, or as a plain string on older processes. */
export const IdentityFieldSchema = z.union([IdentityRefSchema, z.string()]);

export const IterationSchema = z.object({
  id: z.string(),
  name: z.string(),
  path: z.string(),
  attributes: z
    .object({
      startDate: z.string().nullish(),
      finishDate: z.string().nullish(),
      timeFrame: z.string().nullish(),
    })
    .optional(),
});

export const IterationListSchema = z.object({
  value: z.array(IterationSchema),
});

export const WiqlResultSchema = z.object({
  workItems: z.array(z.object({ id: z.number().int() })).default([]),
});

export const WorkItemFieldsSchema = z.object({
  'System.Title': z.string().optional(),
  'System.State': z.string().optional(),
  'System.WorkItemType': z.string().optional(),
  'System.AssignedTo': IdentityFieldSchema.optional(),
  'System.CreatedBy': IdentityFieldSchema.optional(),
  'System.ChangedBy': IdentityFieldSchema.optional(),
  'System.CreatedDate': z.string().optional(),
  'System.ChangedDate': z.string().optional(),
  'System.Description': z.string().optional(),
  'System.Tags': z.string().optional(),
  'System.IterationPath': z.string().optional(),
  'System.CommentCount': z.number().optional(),
});

export const AzureWorkItemSchema = z.object({
  id: z.number().int(),
  fields: WorkItemFieldsSchema.default({}),
});

/** With errorPolicy=omit, ids that cannot be read come back as null entries. */
export const WorkItemBatchSchema = z.object({
  value: z.array(AzureWorkItemSchema.nullable()),
});

export const AzureCommentSchema = z.object({
  id: z.number().int(),
  text: z.string().optional(),
  createdBy: IdentityRefSchema.optional(),
  createdDate: z.string().optional(),
});

export const CommentListSchema = z.object({
  comments: z.array(AzureCommentSchema).default([]),
  continuationToken: z.string().nullish(),
});

export const ConnectionDataSchema = z.object({
  authenticatedUser: z.object({
    id: z.string(),
    providerDisplayName: z.string().optional(),
  }),
});

export type IdentityField = z.infer<typeof IdentityFieldSchema>;
export type AzureIteration = z.infer<typeof IterationSchema>;
export type AzureWorkItem = z.infer<typeof AzureWorkItemSchema>;
export type AzureComment = z.infer<typeof AzureCommentSchema>;
export type AuthenticatedUser = z.infer<typeof ConnectionDataSchema>['authenticatedUser'];
