import { z } from 'zod';

const actionListSchema = z.array(z.string().min(1));

// Loose: keys this module does not know are forwarded to the resource declaration
export const subscribedByOptionsSchema = z.looseObject({
  model: z.string().min(1).optional(),
  controller: z.string().min(1).optional(),
  as: z.string().min(1).optional(),
  withDevise: z.string().min(1).optional(),
  except: actionListSchema.optional(),
  only: actionListSchema.optional(),
});

export const notifyToOptionsSchema = subscribedByOptionsSchema.extend({
  withSubscription: z.union([z.boolean(), subscribedByOptionsSchema]).optional(),
});

const targetsSchema = z.union([
  z.string().min(1),
  z.array(z.string().min(1)).min(1),
]);

export const notifyToDeclarationSchema = z.object({
  targets: targetsSchema,
  options: notifyToOptionsSchema.optional(),
});

export const subscribedByDeclarationSchema = z.object({
  targets: targetsSchema,
  options: subscribedByOptionsSchema.optional(),
});

export const activityRoutesConfigSchema = z.object({
  notifyTo: z.array(notifyToDeclarationSchema).default([]),
  subscribedBy: z.array(subscribedByDeclarationSchema).default([]),
});

export type ActivityRoutesConfig = z.infer<typeof activityRoutesConfigSchema>;
