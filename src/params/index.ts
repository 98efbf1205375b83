/**
 * Parameter types and structured-parameter encoders
 */

export type {
  Scalar,
  Reward,
  Locale,
  QualificationRequirement,
  LayoutParameter,
  NotificationSpec,
  ParameterValue,
  ParameterBag,
  StructuredField,
  EncodedPair,
} from './types.js';

export {
  encodeStructured,
  encodeReward,
  encodeKeywords,
  encodeQualificationRequirements,
  encodeLayoutParameters,
  encodeNotifications,
  formatScalar,
  readScalar,
  STRUCTURED_ENCODERS,
  type StructuredEncoder,
} from './encoders.js';

export {
  scalarSchema,
  rewardSchema,
  keywordsSchema,
  localeSchema,
  qualificationRequirementSchema,
  qualificationRequirementsSchema,
  layoutParameterSchema,
  layoutParametersSchema,
  notificationSchema,
  notificationsSchema,
} from './schemas.js';
