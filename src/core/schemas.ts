// Zod schemas for the messages exchanged over the city bus

import { z } from 'zod';

/**
 * Logical department or service name (e.g. fire_department, emergency-dispatch-center)
 */
export const DepartmentNameSchema = z.string()
  .min(1, 'Department name is required')
  .max(100, 'Department name too long')
  .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'Invalid department name');

/**
 * Priority / urgency enum
 */
export const PrioritySchema = z.enum(['low', 'normal', 'high', 'critical']);

/**
 * Health status reported by a department
 */
export const HealthStatusSchema = z.enum(['healthy', 'warning', 'critical', 'failed']);

/**
 * Council decision outcome
 */
export const DecisionOutcomeSchema = z.enum(['approved', 'rejected', 'deferred']);

/**
 * Kind of routing change broadcast to routing-aware services
 */
export const ChangeTypeSchema = z.enum(['consolidated', 'terminated', 'created', 'renamed']);

/**
 * Reasons an analyzer may give for retiring a department
 */
export const TerminationReasonSchema = z.enum([
  'redundant',
  'obsolete',
  'unused',
  'inefficient',
  'duplicate_services',
  'budget_constraints'
]);

const IsoDateTime = z.string().datetime({ offset: true });
const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

/**
 * Message type tags carried in every envelope
 */
export const MessageTypeSchema = z.enum([
  'health_check',
  'health_status',
  'service_request',
  'consolidation_recommendation',
  'termination_recommendation',
  'council_decision',
  'department_change_notification',
  'department_announcement',
  'department_analysis_request',
  'emergency_call',
  'dispatch_order'
]);

/**
 * Envelope wrapping every payload on the bus
 */
export const MessageEnvelopeSchema = z.object({
  id: z.string().min(1),
  type: MessageTypeSchema,
  from: z.string().min(1),
  to: z.string().min(1),
  published_at: IsoDateTime,
  payload: z.unknown()
});

/**
 * orchestrator → department
 */
export const HealthCheckRequestSchema = z.object({
  check_id: z.string().min(1),
  from: z.string().min(1),
  to: DepartmentNameSchema
});

/**
 * department → orchestrator
 */
export const HealthStatusReplySchema = z.object({
  check_id: z.string().min(1),
  service_name: DepartmentNameSchema,
  status: HealthStatusSchema,
  uptime_seconds: z.number().nonnegative().default(0),
  message_count: z.number().int().nonnegative().default(0),
  details: z.record(z.unknown()).optional()
});

/**
 * consumer → orchestrator: a department is needed that does not exist
 */
export const ServiceRequestSchema = z.object({
  requesting_service: z.string().min(1),
  emergency_type: z.string().optional(),
  description: z.string().min(1),
  urgency: PrioritySchema.default('high'),
  original_call_id: z.string().optional(),
  details: z.object({
    department_needed: DepartmentNameSchema.optional(),
    reason: z.string().optional()
  }).default({})
});

export const ConsolidationRecommendationSchema = z.object({
  recommendation_id: z.string().min(1),
  proposed_name: DepartmentNameSchema.min(3, 'Proposed name must be 3-100 characters'),
  departments_to_merge: z.array(DepartmentNameSchema).min(2, 'Must provide at least 2 departments to merge'),
  similarity_score: z.number().min(0).max(100).nullable().optional(),
  estimated_annual_savings: z.number().nonnegative().nullable().optional(),
  overlapping_functions: z.array(z.string()).default([]),
  unified_capabilities: z.array(z.string()).default([]),
  benefits: z.array(z.string()).default([]),
  rationale: z.string().max(1000).optional(),
  priority: PrioritySchema.default('normal'),
  analyzed_by: z.string().min(1).default('doge')
});

export const ServiceReassignmentSchema = z.object({
  service: z.string().min(1),
  reassign_to: z.string().min(1)
});

export const TerminationRecommendationSchema = z.object({
  recommendation_id: z.string().min(1),
  department_name: DepartmentNameSchema.min(3, 'Department name must be 3-100 characters'),
  termination_reason: TerminationReasonSchema,
  detailed_rationale: z.string().max(1000).optional(),
  services_to_reassign: z.array(ServiceReassignmentSchema).default([]),
  annual_cost: z.number().nonnegative().nullable().optional(),
  priority: PrioritySchema.default('normal'),
  analyzed_by: z.string().min(1).default('doge')
});

export const CouncilDecisionSchema = z.object({
  decision_id: z.string().min(1),
  recommendation_id: z.string().min(1),
  recommendation_type: z.enum(['consolidation', 'termination']),
  decision: DecisionOutcomeSchema,
  decision_rationale: z.string().min(10).max(1000),
  effective_date: IsoDate,
  decided_by: z.string().min(1)
});

export const RollbackInstructionsSchema = z.object({
  action: z.literal('restore_department'),
  department: DepartmentNameSchema
});

export const DepartmentChangeNotificationSchema = z.object({
  change_id: z.string().min(1),
  change_type: ChangeTypeSchema,
  affected_departments: z.array(DepartmentNameSchema).min(1, 'Must provide at least one affected department'),
  new_department: DepartmentNameSchema.optional(),
  routing_changes: z.record(z.string(), DepartmentNameSchema),
  capabilities_mapping: z.record(z.string(), z.union([z.string(), z.array(z.string())])).default({}),
  emergency_types_affected: z.array(z.string()).default([]),
  effective_immediately: z.boolean().default(true),
  effective_date: IsoDateTime.optional(),
  fallback_department: DepartmentNameSchema.optional(),
  additional_instructions: z.string().optional(),
  initiated_by: z.string().min(1).default('city_council'),
  change_timestamp: IsoDateTime,
  rollback_available: z.boolean().default(false),
  rollback_instructions: RollbackInstructionsSchema.optional()
});

export const DepartmentAnnouncementSchema = z.object({
  department_name: DepartmentNameSchema,
  status: z.enum(['created', 'launched', 'failed', 'active']),
  process_id: z.number().int().positive().optional(),
  description: z.string().optional()
});

export const DepartmentAnalysisRequestSchema = z.object({
  request_id: z.string().min(1),
  analysis_type: z.enum(['periodic_audit', 'targeted_review', 'cost_analysis', 'service_overlap']),
  requested_by: z.string().min(1),
  target_departments: z.array(DepartmentNameSchema).default([]),
  focus_areas: z.array(z.string()).default([]),
  similarity_threshold: z.number().min(0).max(1),
  include_cost_analysis: z.boolean().default(true),
  include_usage_metrics: z.boolean().default(true),
  urgency: PrioritySchema.default('normal'),
  reason: z.string().min(10).max(500).optional()
});

export const SeveritySchema = z.enum(['low', 'medium', 'high', 'critical']);

/**
 * An inbound unit of work for the dispatch router
 */
export const EmergencyCallSchema = z.object({
  call_id: z.string().optional(),
  caller_location: z.string().min(1),
  emergency_type: z.string().min(1),
  description: z.string().default(''),
  severity: SeveritySchema.optional(),
  caller_name: z.string().optional(),
  caller_phone: z.string().optional(),
  requested_department: DepartmentNameSchema.optional(),
  injuries_reported: z.boolean().optional(),
  fire_involved: z.boolean().optional(),
  weapons_involved: z.boolean().optional(),
  hazardous_materials: z.boolean().optional(),
  suspects_on_scene: z.boolean().optional(),
  vehicles_involved: z.number().int().nonnegative().optional(),
  number_of_victims: z.number().int().nonnegative().optional()
});

/**
 * Work forwarded by the dispatch router to one department
 */
export const DispatchOrderSchema = EmergencyCallSchema.extend({
  call_id: z.string().min(1),
  department: DepartmentNameSchema,
  requested_as: DepartmentNameSchema,
  dispatched_by: z.string().min(1)
});

/**
 * Type exports
 */
export type MessageType = z.infer<typeof MessageTypeSchema>;
export type MessageEnvelope = z.infer<typeof MessageEnvelopeSchema>;
export type HealthStatus = z.infer<typeof HealthStatusSchema>;
export type Priority = z.infer<typeof PrioritySchema>;
export type DecisionOutcome = z.infer<typeof DecisionOutcomeSchema>;
export type ChangeType = z.infer<typeof ChangeTypeSchema>;
export type TerminationReason = z.infer<typeof TerminationReasonSchema>;
export type HealthCheckRequest = z.infer<typeof HealthCheckRequestSchema>;
export type HealthStatusReply = z.infer<typeof HealthStatusReplySchema>;
export type ServiceRequest = z.infer<typeof ServiceRequestSchema>;
export type ConsolidationRecommendation = z.infer<typeof ConsolidationRecommendationSchema>;
export type TerminationRecommendation = z.infer<typeof TerminationRecommendationSchema>;
export type CouncilDecision = z.infer<typeof CouncilDecisionSchema>;
export type DepartmentChangeNotification = z.infer<typeof DepartmentChangeNotificationSchema>;
export type DepartmentAnnouncement = z.infer<typeof DepartmentAnnouncementSchema>;
export type DepartmentAnalysisRequest = z.infer<typeof DepartmentAnalysisRequestSchema>;
export type EmergencyCall = z.infer<typeof EmergencyCallSchema>;
export type DispatchOrder = z.infer<typeof DispatchOrderSchema>;

/**
 * Validation helper functions
 */
export function validateEnvelope(data: unknown): MessageEnvelope {
  return MessageEnvelopeSchema.parse(data);
}

export function validateChangeNotification(data: unknown): DepartmentChangeNotification {
  return DepartmentChangeNotificationSchema.parse(data);
}

/**
 * Safe validation (returns result instead of throwing)
 */
export function safeValidateEnvelope(data: unknown) {
  return MessageEnvelopeSchema.safeParse(data);
}
