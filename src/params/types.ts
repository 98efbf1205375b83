/**
 * Parameter value types
 * @module params/types
 */

import type { z } from 'zod';
import type {
  layoutParameterSchema,
  localeSchema,
  notificationSchema,
  qualificationRequirementSchema,
  rewardSchema,
  scalarSchema,
} from './schemas.js';

/**
 * A single query value
 */
export type Scalar = z.infer<typeof scalarSchema>;

/**
 * `{ Amount, CurrencyCode, FormattedPrice? }`
 */
export type Reward = z.infer<typeof rewardSchema>;

export type Locale = z.infer<typeof localeSchema>;

export type QualificationRequirement = z.infer<typeof qualificationRequirementSchema>;

export type LayoutParameter = z.infer<typeof layoutParameterSchema>;

/**
 * Notification target. `EventType` may be one event or several.
 */
export type NotificationSpec = z.infer<typeof notificationSchema>;

/**
 * Any value a caller may place in a parameter bag
 */
export type ParameterValue =
  | Scalar
  | Reward
  | string[]
  | QualificationRequirement[]
  | LayoutParameter[]
  | NotificationSpec[];

/**
 * Named parameters for one call. `undefined` and `null` mean absent.
 */
export type ParameterBag = Record<string, ParameterValue | null | undefined>;

/**
 * Parameters that expand into several query fields
 */
export type StructuredField =
  | 'Reward'
  | 'Keywords'
  | 'QualificationRequirement'
  | 'HITLayoutParameter'
  | 'Notification';

/**
 * One query field, name and unescaped value
 */
export type EncodedPair = readonly [name: string, value: string];
