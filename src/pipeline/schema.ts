// src/pipeline/schema.ts

import { z } from 'zod';

export const NotificationBatchSchema = z.object({
  value: z.array(z.unknown()),
});

export const ChangeNotificationSchema = z
  .object({
    subscriptionId: z.string().min(1),
    changeType: z.enum(['created', 'updated', 'deleted']),
    clientState: z.string().optional(),
    resource: z.string().optional(),
    resourceData: z
      .object({
        id: z.string().optional(),
        '@odata.id': z.string().optional(),
      })
      .passthrough()
      .optional(),
    tenantId: z.string().optional(),
    subscriptionExpirationDateTime: z.string().optional(),
  })
  .passthrough();

export type ChangeNotification = z.infer<typeof ChangeNotificationSchema>;

/**
 * Where the changed resource lives: `resource`, then `resourceData['@odata.id']`,
 * then `/messages/{resourceData.id}`.
 */
export function extractResourcePath(notification: ChangeNotification): string | undefined {
  const resource = notification.resource?.trim();
  if (resource) return resource;

  const odataId = notification.resourceData?.['@odata.id']?.trim();
  if (odataId) return odataId;

  const id = notification.resourceData?.id?.trim();
  if (id) return `/messages/${id}`;

  return undefined;
}
