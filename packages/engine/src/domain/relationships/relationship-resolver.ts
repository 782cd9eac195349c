/**
 * Relationship resolution
 *
 * Answers two questions for any participant of a group:
 * - display identity: the participant itself, or the registered user who
 *   claimed it when it is a claimed guest;
 * - aggregation root: the participant whose balance absorbs this one, found
 *   by following management edges upward from the display identity.
 *
 * Claims are resolved lazily: edges are never retargeted at claim time, so
 * both ends of every edge go through display-identity resolution first.
 *
 * Rules:
 * - an entity has at most one manager (two different managers is a conflict)
 * - an edge whose managed entity is a claimed guest is carried over to the
 *   claiming user, unless that user already has a manager of its own; when
 *   several claimed guests bring different managers, the first edge wins
 * - a cycle or a self-reference is an error, never silently ignored
 */

import type {
  GroupRelationships,
  ManagementEdge,
  ParticipantKey,
  ParticipantRef,
  ResolvedIdentity,
} from '@splitledger/shared';
import { LedgerError, type LedgerResult } from '../../core/errors';
import { participantKey, sameParticipant, userRef } from '../../core/participants';

interface ManagerLink {
  manager: ParticipantRef;
  source: ManagementEdge;
}

function fail<T>(error: LedgerError): LedgerResult<T> {
  return { ok: false, error };
}

export class RelationshipResolver {
  private constructor(
    private readonly claims: ReadonlyMap<string, string>,
    private readonly managers: ReadonlyMap<ParticipantKey, ManagerLink>,
    private readonly known: readonly ParticipantRef[]
  ) {}

  /**
   * Build the adjacency map `managed -> manager` for a group.
   *
   * Fails with ConflictingManager when an entity has two different managers.
   */
  static create(relationships: GroupRelationships): LedgerResult<RelationshipResolver> {
    const claims = new Map<string, string>();
    const known: ParticipantRef[] = [];
    for (const participant of relationships.participants) {
      known.push({ kind: participant.kind, id: participant.id });
      if (participant.kind === 'guest' && participant.claimedBy) {
        claims.set(participant.id, participant.claimedBy);
      }
    }

    const display = (ref: ParticipantRef): ParticipantRef => {
      const claimer = ref.kind === 'guest' ? claims.get(ref.id) : undefined;
      return claimer === undefined ? ref : userRef(claimer);
    };

    const managers = new Map<ParticipantKey, ManagerLink>();
    const carried = new Map<ParticipantKey, ManagerLink>();

    for (const edge of relationships.edges) {
      const managed = display(edge.managed);
      const manager = display(edge.manager);
      const isCarried = !sameParticipant(managed, edge.managed);

      if (isCarried && sameParticipant(managed, manager)) {
        // The guest was claimed by its own manager: the two identities have merged
        console.warn(
          `[relationship-resolver] Ignoring edge ${participantKey(edge.managed)} -> ${participantKey(edge.manager)}: guest was claimed by its manager`
        );
        continue;
      }

      const target = isCarried ? carried : managers;
      const key = participantKey(managed);
      const existing = target.get(key);
      if (existing && !sameParticipant(existing.manager, manager)) {
        if (isCarried) {
          // Several guests claimed by one user: the first edge wins
          console.warn(
            `[relationship-resolver] Dropping edge ${participantKey(edge.managed)} -> ${participantKey(edge.manager)}: claiming user ${key} already inherits a manager from ${participantKey(existing.source.managed)}`
          );
          continue;
        }
        return fail(
          new LedgerError(
            'ConflictingManager',
            `${key} is managed by both ${participantKey(existing.manager)} and ${participantKey(manager)}`,
            { participant: key, managers: [participantKey(existing.manager), participantKey(manager)] }
          )
        );
      }
      target.set(key, { manager, source: edge });
    }

    for (const [key, link] of carried) {
      const own = managers.get(key);
      if (own) {
        if (!sameParticipant(own.manager, link.manager)) {
          console.warn(
            `[relationship-resolver] Dropping edge ${participantKey(link.source.managed)} -> ${participantKey(link.source.manager)}: claiming user ${key} already has a manager`
          );
        }
        continue;
      }
      managers.set(key, link);
    }

    return { ok: true, value: new RelationshipResolver(claims, managers, known) };
  }

  /**
   * The participant a guest or user is shown and counted as
   */
  displayIdentity(participant: ParticipantRef): ParticipantRef {
    if (participant.kind === 'guest') {
      const claimer = this.claims.get(participant.id);
      if (claimer !== undefined) {
        return userRef(claimer);
      }
    }
    return participant;
  }

  managerOf(participant: ParticipantRef): ParticipantRef | undefined {
    return this.managers.get(participantKey(this.displayIdentity(participant)))?.manager;
  }

  /**
   * Walk the management chain upward with a visited-set cycle guard
   */
  resolve(participant: ParticipantRef): LedgerResult<ResolvedIdentity> {
    const displayIdentity = this.displayIdentity(participant);
    const chain: ParticipantRef[] = [displayIdentity];
    const visited = new Set<ParticipantKey>([participantKey(displayIdentity)]);

    let current = displayIdentity;
    for (;;) {
      const link = this.managers.get(participantKey(current));
      if (!link) break;

      const managerKey = participantKey(link.manager);
      if (visited.has(managerKey)) {
        const path = [...chain, link.manager].map(participantKey);
        return fail(
          new LedgerError('ManagementCycle', `Management cycle detected: ${path.join(' -> ')}`, {
            participant: participantKey(participant),
            cycle: path,
          })
        );
      }
      visited.add(managerKey);
      chain.push(link.manager);
      current = link.manager;
    }

    return {
      ok: true,
      value: { participant, displayIdentity, aggregationRoot: current, chain },
    };
  }

  /**
   * Resolve every participant the relationships mention.
   *
   * Fails as a whole on the first cycle, so callers never see a partial map.
   */
  resolveAll(extra: readonly ParticipantRef[] = []): LedgerResult<Map<ParticipantKey, ResolvedIdentity>> {
    const resolved = new Map<ParticipantKey, ResolvedIdentity>();
    const candidates: ParticipantRef[] = [...this.known, ...extra];
    for (const link of this.managers.values()) {
      candidates.push(link.source.managed, link.source.manager);
    }

    for (const candidate of candidates) {
      const key = participantKey(candidate);
      if (resolved.has(key)) continue;
      const result = this.resolve(candidate);
      if (!result.ok) return result;
      resolved.set(key, result.value);
    }
    return { ok: true, value: resolved };
  }

  /**
   * Display identities whose aggregation root is `root` (root included)
   */
  findManagedMembers(root: ParticipantRef): LedgerResult<ParticipantRef[]> {
    const all = this.resolveAll([root]);
    if (!all.ok) return all;

    const rootKey = participantKey(root);
    const seen = new Set<ParticipantKey>();
    const members: ParticipantRef[] = [];
    for (const identity of all.value.values()) {
      const displayKey = participantKey(identity.displayIdentity);
      if (participantKey(identity.aggregationRoot) === rootKey && !seen.has(displayKey)) {
        seen.add(displayKey);
        members.push(identity.displayIdentity);
      }
    }
    return { ok: true, value: members };
  }
}

export function createRelationshipResolver(
  relationships: GroupRelationships
): LedgerResult<RelationshipResolver> {
  return RelationshipResolver.create(relationships);
}

/**
 * Resolve one participant's display identity and aggregation root
 */
export function resolveIdentity(
  relationships: GroupRelationships,
  participant: ParticipantRef
): LedgerResult<ResolvedIdentity> {
  const resolver = RelationshipResolver.create(relationships);
  if (!resolver.ok) return resolver;
  return resolver.value.resolve(participant);
}

/**
 * Map every participant key the relationships mention to its aggregation root
 */
export function buildAggregationRootMap(
  relationships: GroupRelationships
): LedgerResult<Map<ParticipantKey, ParticipantKey>> {
  const resolver = RelationshipResolver.create(relationships);
  if (!resolver.ok) return resolver;
  const all = resolver.value.resolveAll();
  if (!all.ok) return all;

  const roots = new Map<ParticipantKey, ParticipantKey>();
  for (const [key, identity] of all.value) {
    roots.set(key, participantKey(identity.aggregationRoot));
  }
  return { ok: true, value: roots };
}
