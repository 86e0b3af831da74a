import { MemberNotFoundError, ValidationError } from '../../src/errors/domain-errors';
import { MemberRelationService } from '../../src/services/member-relation.service';
import { MemberService } from '../../src/services/member.service';
import { InMemoryMemberRelationRepository, InMemoryMemberRepository } from '../helpers/in-memory-repositories';

describe('MemberService', () => {
  const now = new Date(2024, 0, 15, 12);
  let members: InMemoryMemberRepository;
  let relations: InMemoryMemberRelationRepository;
  let service: MemberService;

  beforeEach(() => {
    members = new InMemoryMemberRepository(['m1', 'm2']);
    relations = new InMemoryMemberRelationRepository();
    service = new MemberService(members, new MemberRelationService(relations, members, () => now), () => now);
  });

  it('should register a member with a trimmed name', async () => {
    const member = await service.registerMember('  Jamie Doe ');

    expect(member.fullName).toBe('Jamie Doe');
    expect(member.createdAt).toEqual(now);
    expect(await service.getMember(member.id)).toEqual(member);
  });

  it('should create default ACCOMPANY relations with every existing member', async () => {
    const member = await service.registerMember('Jamie');

    expect(relations.relations).toHaveLength(4);
    expect(relations.relations.every((r) => r.relation === 'ACCOMPANY')).toBe(true);
    expect(await relations.findAccompanyByFromId(member.id)).toEqual(['m1', 'm2']);
    expect(await relations.findAccompanyByFromId('m1')).toEqual([member.id]);
  });

  it('should reject a blank name', async () => {
    await expect(service.registerMember('   ')).rejects.toBeInstanceOf(ValidationError);
    expect(members.members.size).toBe(2);
  });

  it('should fail to get an unknown member', async () => {
    await expect(service.getMember('ghost')).rejects.toBeInstanceOf(MemberNotFoundError);
    expect(await service.exists('ghost')).toBe(false);
    expect(await service.exists('m1')).toBe(true);
  });
});
