import { randomUUID } from 'crypto';
import type { MemberId, MemberRelation, RelationType } from '../types/models.js';

export function createMemberRelation(
  fromId: MemberId,
  toId: MemberId,
  relation: RelationType = 'ACCOMPANY',
  now: Date = new Date()
): MemberRelation {
  return {
    id: randomUUID(),
    fromId,
    toId,
    relation,
    lastUpdatedAt: now,
  };
}

/** ACCOMPANY -> FRIEND; there is no transition back */
export function promoteToFriend(relation: MemberRelation, now: Date = new Date()): MemberRelation {
  return {
    ...relation,
    relation: 'FRIEND',
    lastUpdatedAt: now,
  };
}
