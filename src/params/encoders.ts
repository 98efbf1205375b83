/**
 * Structured-parameter encoders
 *
 * Each encoder expands one structured parameter into an ordered list of
 * query fields. Indices are 1-based, in iteration order. Values are returned
 * unescaped; the request builder escapes them.
 *
 * @module params/encoders
 */

import type { z } from 'zod';
import { InvalidParameterError, MissingParameterError } from '../errors/index.js';
import {
  keywordsSchema,
  layoutParametersSchema,
  notificationsSchema,
  qualificationRequirementsSchema,
  rewardSchema,
  scalarSchema,
} from './schemas.js';
import type { EncodedPair, ParameterBag, ParameterValue, Scalar, StructuredField } from './types.js';

export type StructuredEncoder = (params: ParameterBag) => EncodedPair[];

/**
 * Formats a scalar for the query string
 */
export function formatScalar(value: Scalar): string {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  return String(value);
}

/**
 * Reads a scalar parameter, rejecting structured values
 *
 * @throws {InvalidParameterError} If the value is a record or list
 */
export function readScalar(key: string, value: ParameterValue): string {
  const result = scalarSchema.safeParse(value);
  if (!result.success) {
    throw InvalidParameterError.notScalar(key);
  }
  return formatScalar(result.data);
}

function readStructured<T>(
  params: ParameterBag,
  key: StructuredField,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  const value = params[key];
  if (value === undefined || value === null) {
    throw new MissingParameterError(key);
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message
    );
    throw new InvalidParameterError(key, issues.join(', '), issues);
  }
  return result.data;
}

/**
 * `Reward.1.Amount`, `Reward.1.CurrencyCode`, `Reward.1.FormattedPrice`
 */
export function encodeReward(params: ParameterBag): EncodedPair[] {
  const reward = readStructured(params, 'Reward', rewardSchema);
  const pairs: EncodedPair[] = [
    ['Reward.1.Amount', formatScalar(reward.Amount)],
    ['Reward.1.CurrencyCode', reward.CurrencyCode],
  ];
  if (reward.FormattedPrice !== undefined) {
    pairs.push(['Reward.1.FormattedPrice', reward.FormattedPrice]);
  }
  return pairs;
}

/**
 * A single comma-joined `Keywords` field
 */
export function encodeKeywords(params: ParameterBag): EncodedPair[] {
  const keywords = readStructured(params, 'Keywords', keywordsSchema);
  return [['Keywords', typeof keywords === 'string' ? keywords : keywords.join(',')]];
}

/**
 * `QualificationRequirement.i.*`, with locales as
 * `QualificationRequirement.i.LocaleValue.z.Country` / `.Subdivision`
 */
export function encodeQualificationRequirements(params: ParameterBag): EncodedPair[] {
  const requirements = readStructured(
    params,
    'QualificationRequirement',
    qualificationRequirementsSchema
  );

  const pairs: EncodedPair[] = [];
  requirements.forEach((requirement, index) => {
    const prefix = `QualificationRequirement.${index + 1}`;
    pairs.push([`${prefix}.QualificationTypeId`, requirement.QualificationTypeId]);
    pairs.push([`${prefix}.Comparator`, requirement.Comparator]);

    if (requirement.IntegerValue !== undefined) {
      pairs.push([`${prefix}.IntegerValue`, formatScalar(requirement.IntegerValue)]);
    }

    requirement.LocaleValue?.forEach((locale, localeIndex) => {
      const localePrefix = `${prefix}.LocaleValue.${localeIndex + 1}`;
      pairs.push([`${localePrefix}.Country`, locale.Country]);
      if (locale.Subdivision !== undefined) {
        pairs.push([`${localePrefix}.Subdivision`, locale.Subdivision]);
      }
    });

    if (requirement.RequiredToPreview !== undefined) {
      pairs.push([`${prefix}.RequiredToPreview`, formatScalar(requirement.RequiredToPreview)]);
    }
  });
  return pairs;
}

/**
 * `HITLayoutParameter.i.Name`, `HITLayoutParameter.i.Value`
 */
export function encodeLayoutParameters(params: ParameterBag): EncodedPair[] {
  const layoutParameters = readStructured(params, 'HITLayoutParameter', layoutParametersSchema);

  return layoutParameters.flatMap((parameter, index): EncodedPair[] => [
    [`HITLayoutParameter.${index + 1}.Name`, parameter.Name],
    [`HITLayoutParameter.${index + 1}.Value`, formatScalar(parameter.Value)],
  ]);
}

/**
 * `Notification.i.Destination`, `.Transport`, `.Version`, `.EventType`.
 *
 * A single event type is sent as `Notification.i.EventType`. Several are
 * sent as `Notification.z.EventType`, indexed by their position in the event
 * list, not by the notification's index; the service accepts this form.
 */
export function encodeNotifications(params: ParameterBag): EncodedPair[] {
  const notifications = readStructured(params, 'Notification', notificationsSchema);

  const pairs: EncodedPair[] = [];
  notifications.forEach((notification, index) => {
    const prefix = `Notification.${index + 1}`;
    pairs.push([`${prefix}.Destination`, notification.Destination]);
    pairs.push([`${prefix}.Transport`, notification.Transport]);
    pairs.push([`${prefix}.Version`, notification.Version]);

    const events =
      typeof notification.EventType === 'string' ? [notification.EventType] : notification.EventType;

    if (events.length > 1) {
      events.forEach((event, eventIndex) => {
        pairs.push([`Notification.${eventIndex + 1}.EventType`, event]);
      });
    } else {
      for (const event of events) {
        pairs.push([`${prefix}.EventType`, event]);
      }
    }
  });
  return pairs;
}

/**
 * Encoder for each structured field
 */
export const STRUCTURED_ENCODERS: Readonly<Record<StructuredField, StructuredEncoder>> = {
  Reward: encodeReward,
  Keywords: encodeKeywords,
  QualificationRequirement: encodeQualificationRequirements,
  HITLayoutParameter: encodeLayoutParameters,
  Notification: encodeNotifications,
};

/**
 * Encodes one structured field from the merged parameters
 *
 * @throws {MissingParameterError} If the field is absent
 * @throws {InvalidParameterError} If the field has the wrong shape
 */
export function encodeStructured(field: StructuredField, params: ParameterBag): EncodedPair[] {
  return STRUCTURED_ENCODERS[field](params);
}
