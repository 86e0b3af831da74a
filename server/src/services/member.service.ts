import { randomUUID } from 'crypto';
import { logger } from '../config/logger.js';
import { MemberNotFoundError, ValidationError } from '../errors/domain-errors.js';
import type { MemberRepository } from '../repositories/member.repository.js';
import type { Member, MemberId } from '../types/models.js';
import { systemClock, type Clock } from '../utils/clock.js';
import type { MemberRelationService } from './member-relation.service.js';

export class MemberService {
  constructor(
    private readonly memberRepository: MemberRepository,
    private readonly memberRelationService: MemberRelationService,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Register a member and give them the default ACCOMPANY relations
   */
  async registerMember(fullName: string): Promise<Member> {
    const name = fullName.trim();
    if (name === '') {
      throw new ValidationError('fullName must not be empty');
    }

    const member = await this.memberRepository.save({
      id: randomUUID(),
      fullName: name,
      createdAt: this.clock(),
    });
    logger.info('Member registered', { memberId: member.id });

    await this.memberRelationService.createDefaultRelations(member.id);
    return member;
  }

  async getMember(id: MemberId): Promise<Member> {
    const member = await this.memberRepository.findById(id);
    if (!member) {
      throw new MemberNotFoundError(id);
    }
    return member;
  }

  async exists(id: MemberId): Promise<boolean> {
    return (await this.memberRepository.findById(id)) !== null;
  }

  async getAllMemberIds(): Promise<MemberId[]> {
    return this.memberRepository.findAllIds();
  }
}
