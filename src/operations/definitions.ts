/**
 * Declarations of every supported requester API operation
 * @module operations/definitions
 */

import type { StructuredField } from '../params/types.js';
import type { OperationSpec } from './types.js';

const PAGING = ['PageSize', 'PageNumber'] as const;
const SORTING = ['SortProperty', 'SortDirection'] as const;

/**
 * Declares an operation. Specs are frozen once declared.
 */
export function defineOperation(spec: {
  operation: string;
  required?: readonly string[];
  optional?: readonly string[];
  structured?: readonly StructuredField[];
  resultKey: string;
}): OperationSpec {
  return Object.freeze({
    operation: spec.operation,
    required: Object.freeze([...(spec.required ?? [])]),
    optional: Object.freeze([...(spec.optional ?? [])]),
    structured: Object.freeze([...(spec.structured ?? [])]),
    resultKey: spec.resultKey,
  });
}

/**
 * Operation spec per client method
 */
export const OPERATIONS = {
  // HITs
  createHITByTypeIdAndLayoutId: defineOperation({
    operation: 'CreateHIT',
    required: ['HITTypeId', 'HITLayoutId', 'LifetimeInSeconds', 'MaxAssignments'],
    optional: ['RequesterAnnotation', 'UniqueRequestToken'],
    structured: ['HITLayoutParameter'],
    resultKey: 'HIT',
  }),
  createHITByLayoutId: defineOperation({
    operation: 'CreateHIT',
    required: [
      'Title',
      'Description',
      'HITLayoutId',
      'AssignmentDurationInSeconds',
      'LifetimeInSeconds',
      'MaxAssignments',
      'AutoApprovalDelayInSeconds',
    ],
    optional: ['RequesterAnnotation', 'UniqueRequestToken'],
    structured: ['Reward', 'HITLayoutParameter', 'Keywords', 'QualificationRequirement'],
    resultKey: 'HIT',
  }),
  changeHITTypeOfHIT: defineOperation({
    operation: 'ChangeHITTypeOfHIT',
    required: ['HITId', 'HITTypeId'],
    resultKey: 'ChangeHITTypeOfHITResult',
  }),
  getHIT: defineOperation({
    operation: 'GetHIT',
    required: ['HITId'],
    resultKey: 'HIT',
  }),
  searchHITs: defineOperation({
    operation: 'SearchHITs',
    optional: [...SORTING, ...PAGING],
    resultKey: 'SearchHITsResult',
  }),
  getReviewableHITs: defineOperation({
    operation: 'GetReviewableHITs',
    optional: ['HITTypeId', 'Status', ...SORTING, ...PAGING],
    resultKey: 'GetReviewableHITsResult',
  }),
  setHITAsReviewing: defineOperation({
    operation: 'SetHITAsReviewing',
    required: ['HITId'],
    optional: ['Revert'],
    resultKey: 'SetHITAsReviewingResult',
  }),
  extendHIT: defineOperation({
    operation: 'ExtendHIT',
    required: ['HITId'],
    optional: ['MaxAssignmentsIncrement', 'ExpirationIncrementInSeconds', 'UniqueRequestToken'],
    resultKey: 'ExtendHITResult',
  }),
  forceExpireHIT: defineOperation({
    operation: 'ForceExpireHIT',
    required: ['HITId'],
    resultKey: 'ForceExpireHITResult',
  }),
  disableHIT: defineOperation({
    operation: 'DisableHIT',
    required: ['HITId'],
    resultKey: 'DisableHITResult',
  }),
  disposeHIT: defineOperation({
    operation: 'DisposeHIT',
    required: ['HITId'],
    resultKey: 'DisposeHITResult',
  }),

  // HIT types
  registerHITType: defineOperation({
    operation: 'RegisterHITType',
    required: ['Title', 'Description', 'AssignmentDurationInSeconds', 'AutoApprovalDelayInSeconds'],
    structured: ['Reward', 'Keywords', 'QualificationRequirement'],
    resultKey: 'RegisterHITTypeResult',
  }),
  setHITTypeNotification: defineOperation({
    operation: 'SetHITTypeNotification',
    required: ['HITTypeId'],
    optional: ['Active'],
    structured: ['Notification'],
    resultKey: 'SetHITTypeNotificationResult',
  }),

  // Assignments
  getAssignmentsForHIT: defineOperation({
    operation: 'GetAssignmentsForHIT',
    required: ['HITId'],
    optional: ['AssignmentStatus', ...SORTING, ...PAGING],
    resultKey: 'GetAssignmentsForHITResult',
  }),
  getAssignment: defineOperation({
    operation: 'GetAssignment',
    required: ['AssignmentId'],
    resultKey: 'GetAssignmentResult',
  }),
  approveAssignment: defineOperation({
    operation: 'ApproveAssignment',
    required: ['AssignmentId'],
    optional: ['RequesterFeedback'],
    resultKey: 'ApproveAssignmentResult',
  }),
  rejectAssignment: defineOperation({
    operation: 'RejectAssignment',
    required: ['AssignmentId'],
    optional: ['RequesterFeedback'],
    resultKey: 'RejectAssignmentResult',
  }),
  approveRejectedAssignment: defineOperation({
    operation: 'ApproveRejectedAssignment',
    required: ['AssignmentId'],
    optional: ['RequesterFeedback'],
    resultKey: 'ApproveRejectedAssignmentResult',
  }),
  getFileUploadURL: defineOperation({
    operation: 'GetFileUploadURL',
    required: ['AssignmentId', 'QuestionIdentifier'],
    resultKey: 'GetFileUploadURLResult',
  }),

  // Notifications
  sendTestEventNotification: defineOperation({
    operation: 'SendTestEventNotification',
    required: ['TestEventType'],
    structured: ['Notification'],
    resultKey: 'SendTestEventNotificationResult',
  }),
  notifyWorkers: defineOperation({
    operation: 'NotifyWorkers',
    required: ['Subject', 'MessageText', 'WorkerId'],
    structured: ['Notification'],
    resultKey: 'NotifyWorkersResult',
  }),

  // Workers and bonuses
  grantBonus: defineOperation({
    operation: 'GrantBonus',
    required: ['WorkerId', 'AssignmentId', 'BonusAmount', 'Reason'],
    optional: ['UniqueRequestToken'],
    resultKey: 'GrantBonusResult',
  }),
  getBonusPayments: defineOperation({
    operation: 'GetBonusPayments',
    optional: ['HITId', 'AssignmentId', ...PAGING],
    resultKey: 'GetBonusPaymentsResult',
  }),
  // Earlier clients sent UnblockWorker here as well.
  blockWorker: defineOperation({
    operation: 'BlockWorker',
    required: ['WorkerId', 'Reason'],
    resultKey: 'BlockWorkerResult',
  }),
  unblockWorker: defineOperation({
    operation: 'UnblockWorker',
    required: ['WorkerId'],
    optional: ['Reason'],
    resultKey: 'UnblockWorkerResult',
  }),
  getBlockedWorkers: defineOperation({
    operation: 'GetBlockedWorkers',
    optional: ['PageNumber', 'PageSize'],
    resultKey: 'GetBlockedWorkersResult',
  }),

  // Account and statistics
  getAccountBalance: defineOperation({
    operation: 'GetAccountBalance',
    resultKey: 'GetAccountBalanceResult',
  }),
  getRequesterStatistic: defineOperation({
    operation: 'GetRequesterStatistic',
    required: ['Statistic', 'TimePeriod'],
    optional: ['Count'],
    resultKey: 'GetStatisticResult',
  }),
  getRequesterWorkerStatistic: defineOperation({
    operation: 'GetRequesterWorkerStatistic',
    required: ['Statistic', 'WorkerId', 'TimePeriod'],
    optional: ['Count'],
    resultKey: 'GetStatisticResult',
  }),
} satisfies Record<string, OperationSpec>;

export type OperationName = keyof typeof OPERATIONS;
