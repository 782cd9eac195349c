/**
 * Management and claim relationship types
 */

import type { Participant, ParticipantRef } from './participant';

/**
 * Directed edge: `managed`'s balance is folded into `manager`'s
 */
export interface ManagementEdge {
  managed: ParticipantRef;
  manager: ParticipantRef;
}

export interface GroupRelationships {
  groupId: string;
  participants: Participant[];
  edges: ManagementEdge[];
}

export interface ResolvedIdentity {
  participant: ParticipantRef;
  displayIdentity: ParticipantRef;
  aggregationRoot: ParticipantRef;
  chain: ParticipantRef[]; // Display identity first, aggregation root last
}

/**
 * Result of validating a relationship operation
 */
export interface RelationshipValidation {
  valid: boolean;
  reason?: string;
}
