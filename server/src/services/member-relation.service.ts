import { logger } from '../config/logger.js';
import { createMemberRelation, promoteToFriend } from '../domain/member-relation.js';
import {
  AlreadyFriendError,
  FriendNotFoundError,
  MemberNotFoundError,
  RelationAlreadyExistsError,
  SelfRelationError,
} from '../errors/domain-errors.js';
import type { MemberRepository } from '../repositories/member.repository.js';
import type { MemberRelationRepository } from '../repositories/member-relation.repository.js';
import type { MemberId, MemberRelation, RelationType } from '../types/models.js';
import { systemClock, type Clock } from '../utils/clock.js';

export class MemberRelationService {
  constructor(
    private readonly memberRelationRepository: MemberRelationRepository,
    private readonly memberRepository: MemberRepository,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Every member `fromId` has a relation to, of any type
   */
  async getAllRelationShip(fromId: MemberId): Promise<MemberId[]> {
    return this.memberRelationRepository.findByFromId(fromId);
  }

  async getFriendRelationIds(fromId: MemberId): Promise<MemberId[]> {
    return this.memberRelationRepository.findFriendsByFromId(fromId);
  }

  async getAccompanyRelationIds(fromId: MemberId): Promise<MemberId[]> {
    return this.memberRelationRepository.findAccompanyByFromId(fromId);
  }

  async isFriend(fromId: MemberId, toId: MemberId): Promise<boolean> {
    return this.memberRelationRepository.isFriend(fromId, toId);
  }

  async findRandomOfFriend(memberId: MemberId, limit: number): Promise<MemberId[]> {
    return this.memberRelationRepository.findRandomOfFriend(memberId, limit);
  }

  async findRandomOfAccompany(memberId: MemberId, limit: number): Promise<MemberId[]> {
    return this.memberRelationRepository.findRandomOfAccompany(memberId, limit);
  }

  /**
   * Create a directed relation. New relations start as ACCOMPANY.
   */
  async createRelation(
    fromId: MemberId,
    toId: MemberId,
    relation: RelationType = 'ACCOMPANY'
  ): Promise<MemberRelation> {
    if (fromId === toId) {
      throw new SelfRelationError(fromId);
    }

    for (const memberId of [fromId, toId]) {
      const member = await this.memberRepository.findById(memberId);
      if (!member) {
        throw new MemberNotFoundError(memberId);
      }
    }

    const existing = await this.memberRelationRepository.findByFromIdAndToId(fromId, toId);
    if (existing) {
      throw new RelationAlreadyExistsError(fromId, toId);
    }

    const saved = await this.memberRelationRepository.save(
      createMemberRelation(fromId, toId, relation, this.clock())
    );
    logger.info('Member relation created', { fromId, toId, relation: saved.relation });
    return saved;
  }

  /**
   * Promote an existing ACCOMPANY relation to FRIEND. Calling it for a pair
   * that is already FRIEND is an error, not a no-op.
   */
  async updateRelationToFriend(fromId: MemberId, toId: MemberId): Promise<MemberRelation> {
    const existing = await this.memberRelationRepository.findByFromIdAndToId(fromId, toId);
    if (!existing) {
      throw new FriendNotFoundError(fromId, toId);
    }
    if (existing.relation === 'FRIEND') {
      throw new AlreadyFriendError(fromId, toId);
    }

    // Conditional on the stored type, so of two racing promotions only one wins
    const saved = await this.memberRelationRepository.updateRelationType(
      promoteToFriend(existing, this.clock()),
      'ACCOMPANY'
    );
    if (!saved) {
      const current = await this.memberRelationRepository.findByFromIdAndToId(fromId, toId);
      if (!current) {
        throw new FriendNotFoundError(fromId, toId);
      }
      throw new AlreadyFriendError(fromId, toId);
    }

    logger.info('Member relation promoted to friend', { fromId, toId, relationId: saved.id });
    return saved;
  }

  /**
   * Relate a newly registered member with everyone else as ACCOMPANY, both
   * directions. Returns the number of relations written.
   */
  async createDefaultRelations(memberId: MemberId): Promise<number> {
    const now = this.clock();
    const others = (await this.memberRepository.findAllIds()).filter((id) => id !== memberId);

    const relations = others.flatMap((otherId) => [
      createMemberRelation(memberId, otherId, 'ACCOMPANY', now),
      createMemberRelation(otherId, memberId, 'ACCOMPANY', now),
    ]);

    const created = await this.memberRelationRepository.saveAllNew(relations);
    logger.info('Default member relations created', { memberId, created });
    return created;
  }
}
