/**
 * Shape validation for structured request parameters
 * @module params/schemas
 */

import { z } from 'zod';

export const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const rewardSchema = z.object({
  Amount: z.union([z.string().min(1), z.number()]),
  CurrencyCode: z.string().min(1),
  FormattedPrice: z.string().optional(),
});

export const keywordsSchema = z.union([z.array(z.string()), z.string()]);

export const localeSchema = z.object({
  Country: z.string().min(1),
  Subdivision: z.string().min(1).optional(),
});

export const qualificationRequirementSchema = z.object({
  QualificationTypeId: z.string().min(1),
  Comparator: z.string().min(1),
  IntegerValue: z.union([z.number().int(), z.string().min(1)]).optional(),
  LocaleValue: z.array(localeSchema).optional(),
  RequiredToPreview: z.union([z.boolean(), z.string()]).optional(),
});

export const qualificationRequirementsSchema = z.array(qualificationRequirementSchema);

export const layoutParameterSchema = z.object({
  Name: z.string().min(1),
  Value: z.union([z.string(), z.number()]),
});

export const layoutParametersSchema = z.array(layoutParameterSchema);

export const notificationSchema = z.object({
  Destination: z.string().min(1),
  Transport: z.string().min(1),
  Version: z.string().min(1),
  EventType: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
});

export const notificationsSchema = z.array(notificationSchema);
