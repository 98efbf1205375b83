/**
 * Request parameter types, one per client method.
 *
 * Declared as type aliases so they are assignable to ParameterBag. Fields
 * marked optional here may still be required by the operation; they can be
 * supplied through mode defaults and are checked when the request is built.
 *
 * @module types/requests
 */

import type {
  LayoutParameter,
  NotificationSpec,
  QualificationRequirement,
  Reward,
} from '../params/types.js';

export type SortDirection = 'Ascending' | 'Descending';

// HITs

export type CreateHITByTypeIdAndLayoutIdRequest = {
  HITTypeId?: string;
  HITLayoutId?: string;
  LifetimeInSeconds?: number;
  MaxAssignments?: number;
  HITLayoutParameter?: LayoutParameter[];
  RequesterAnnotation?: string;
  UniqueRequestToken?: string;
};

export type CreateHITByLayoutIdRequest = {
  Title?: string;
  Description?: string;
  HITLayoutId?: string;
  AssignmentDurationInSeconds?: number;
  LifetimeInSeconds?: number;
  MaxAssignments?: number;
  AutoApprovalDelayInSeconds?: number;
  Reward?: Reward;
  HITLayoutParameter?: LayoutParameter[];
  Keywords?: string[];
  QualificationRequirement?: QualificationRequirement[];
  RequesterAnnotation?: string;
  UniqueRequestToken?: string;
};

export type ChangeHITTypeOfHITRequest = {
  HITId: string;
  HITTypeId: string;
};

export type GetHITRequest = {
  HITId: string;
};

export type SearchHITsRequest = {
  SortProperty?: 'Title' | 'Reward' | 'Expiration' | 'CreationTime' | 'Enumeration';
  SortDirection?: SortDirection;
  PageSize?: number;
  PageNumber?: number;
};

export type GetReviewableHITsRequest = {
  HITTypeId?: string;
  Status?: 'Reviewable' | 'Reviewing';
  SortProperty?: 'Title' | 'Reward' | 'Expiration' | 'CreationTime' | 'Enumeration';
  SortDirection?: SortDirection;
  PageSize?: number;
  PageNumber?: number;
};

export type SetHITAsReviewingRequest = {
  HITId: string;
  Revert?: boolean;
};

export type ExtendHITRequest = {
  HITId: string;
  MaxAssignmentsIncrement?: number;
  ExpirationIncrementInSeconds?: number;
  UniqueRequestToken?: string;
};

export type HITIdRequest = {
  HITId: string;
};

// HIT types

export type RegisterHITTypeRequest = {
  Title?: string;
  Description?: string;
  AssignmentDurationInSeconds?: number;
  AutoApprovalDelayInSeconds?: number;
  Reward?: Reward;
  Keywords?: string[];
  QualificationRequirement?: QualificationRequirement[];
};

export type SetHITTypeNotificationRequest = {
  HITTypeId: string;
  Notification?: NotificationSpec[];
  Active?: boolean;
};

// Assignments

export type GetAssignmentsForHITRequest = {
  HITId: string;
  AssignmentStatus?: 'Submitted' | 'Approved' | 'Rejected';
  SortProperty?: 'AcceptTime' | 'SubmitTime' | 'AssignmentStatus';
  SortDirection?: SortDirection;
  PageSize?: number;
  PageNumber?: number;
};

export type GetAssignmentRequest = {
  AssignmentId: string;
};

export type AssignmentFeedbackRequest = {
  AssignmentId: string;
  RequesterFeedback?: string;
};

export type GetFileUploadURLRequest = {
  AssignmentId: string;
  QuestionIdentifier: string;
};

// Notifications

export type SendTestEventNotificationRequest = {
  TestEventType: string;
  Notification?: NotificationSpec[];
};

export type NotifyWorkersRequest = {
  Subject: string;
  MessageText: string;
  WorkerId: string;
  Notification?: NotificationSpec[];
};

// Workers

export type GrantBonusRequest = {
  WorkerId: string;
  AssignmentId: string;
  BonusAmount: string | number;
  Reason: string;
  UniqueRequestToken?: string;
};

export type GetBonusPaymentsRequest = {
  HITId?: string;
  AssignmentId?: string;
  PageSize?: number;
  PageNumber?: number;
};

export type BlockWorkerRequest = {
  WorkerId: string;
  Reason: string;
};

export type UnblockWorkerRequest = {
  WorkerId: string;
  Reason?: string;
};

export type GetBlockedWorkersRequest = {
  PageNumber?: number;
  PageSize?: number;
};

// Account

export type GetRequesterStatisticRequest = {
  Statistic: string;
  TimePeriod: 'OneDay' | 'SevenDays' | 'ThirtyDays' | 'LifeToDate';
  Count?: number;
};

export type GetRequesterWorkerStatisticRequest = {
  Statistic: string;
  WorkerId: string;
  TimePeriod: 'OneDay' | 'SevenDays' | 'ThirtyDays' | 'LifeToDate';
  Count?: number;
};
