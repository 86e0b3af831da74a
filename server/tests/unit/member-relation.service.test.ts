import {
  AlreadyFriendError,
  FriendNotFoundError,
  MemberNotFoundError,
  RelationAlreadyExistsError,
  SelfRelationError,
} from '../../src/errors/domain-errors';
import { MemberRelationService } from '../../src/services/member-relation.service';
import { InMemoryMemberRelationRepository, InMemoryMemberRepository } from '../helpers/in-memory-repositories';

describe('MemberRelationService', () => {
  const now = new Date(2024, 0, 15, 12);
  let relations: InMemoryMemberRelationRepository;
  let members: InMemoryMemberRepository;
  let service: MemberRelationService;

  beforeEach(() => {
    relations = new InMemoryMemberRelationRepository();
    members = new InMemoryMemberRepository(['alice', 'bob', 'carol', 'dave']);
    service = new MemberRelationService(relations, members, () => now);
  });

  describe('queries', () => {
    beforeEach(() => {
      relations.add('alice', 'bob', 'FRIEND');
      relations.add('alice', 'carol', 'ACCOMPANY');
      relations.add('alice', 'dave', 'ACCOMPANY');
      relations.add('bob', 'alice', 'ACCOMPANY');
    });

    it('should list every outgoing relation', async () => {
      expect(await service.getAllRelationShip('alice')).toEqual(['bob', 'carol', 'dave']);
    });

    it('should filter by relation type', async () => {
      expect(await service.getFriendRelationIds('alice')).toEqual(['bob']);
      expect(await service.getAccompanyRelationIds('alice')).toEqual(['carol', 'dave']);
    });

    it('should tell whether a directed pair is FRIEND', async () => {
      expect(await service.isFriend('alice', 'bob')).toBe(true);
      expect(await service.isFriend('bob', 'alice')).toBe(false);
    });

    it('should sample at most limit targets of the requested type', async () => {
      const accompany = await service.findRandomOfAccompany('alice', 1);
      expect(accompany).toHaveLength(1);
      expect(['carol', 'dave']).toContain(accompany[0]);
      expect(await service.findRandomOfFriend('alice', 8)).toEqual(['bob']);
    });
  });

  describe('createRelation', () => {
    it('should create an ACCOMPANY relation by default', async () => {
      const relation = await service.createRelation('alice', 'bob');

      expect(relation).toMatchObject({ fromId: 'alice', toId: 'bob', relation: 'ACCOMPANY', lastUpdatedAt: now });
      expect(await relations.findByFromIdAndToId('alice', 'bob')).toEqual(relation);
    });

    it('should reject a relation to oneself', async () => {
      await expect(service.createRelation('alice', 'alice')).rejects.toBeInstanceOf(SelfRelationError);
      expect(relations.relations).toHaveLength(0);
    });

    it('should reject unknown members', async () => {
      await expect(service.createRelation('alice', 'zed')).rejects.toBeInstanceOf(MemberNotFoundError);
      await expect(service.createRelation('zed', 'alice')).rejects.toMatchObject({ context: { memberId: 'zed' } });
    });

    it('should reject a second relation for the same ordered pair', async () => {
      await service.createRelation('alice', 'bob');

      await expect(service.createRelation('alice', 'bob')).rejects.toBeInstanceOf(RelationAlreadyExistsError);
      // The reverse direction is a different pair
      await expect(service.createRelation('bob', 'alice')).resolves.toMatchObject({ relation: 'ACCOMPANY' });
    });
  });

  describe('updateRelationToFriend', () => {
    it('should fail with FriendNotFound when no relation exists', async () => {
      await expect(service.updateRelationToFriend('alice', 'bob')).rejects.toBeInstanceOf(FriendNotFoundError);
    });

    it('should promote once and fail with AlreadyFriend on the second call', async () => {
      relations.add('alice', 'bob', 'ACCOMPANY');

      const promoted = await service.updateRelationToFriend('alice', 'bob');
      expect(promoted).toMatchObject({ id: 'rel-alice-bob', relation: 'FRIEND', lastUpdatedAt: now });
      expect(await service.isFriend('alice', 'bob')).toBe(true);

      await expect(service.updateRelationToFriend('alice', 'bob')).rejects.toBeInstanceOf(AlreadyFriendError);
      expect(relations.relations).toHaveLength(1);
    });

    it('should let only one of two concurrent promotions succeed', async () => {
      relations.add('alice', 'bob', 'ACCOMPANY');

      const results = await Promise.allSettled([
        service.updateRelationToFriend('alice', 'bob'),
        service.updateRelationToFriend('alice', 'bob'),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
      const [, second] = results;
      expect(second.status === 'rejected' && second.reason).toBeInstanceOf(AlreadyFriendError);
      expect(relations.relations).toEqual([
        { id: 'rel-alice-bob', fromId: 'alice', toId: 'bob', relation: 'FRIEND', lastUpdatedAt: now },
      ]);
    });

    it('should only touch the requested direction', async () => {
      relations.add('alice', 'bob', 'ACCOMPANY');
      relations.add('bob', 'alice', 'ACCOMPANY');

      await service.updateRelationToFriend('alice', 'bob');

      expect(await service.getFriendRelationIds('bob')).toEqual([]);
    });
  });

  describe('createDefaultRelations', () => {
    it('should relate the member with everyone else in both directions', async () => {
      const created = await service.createDefaultRelations('alice');

      expect(created).toBe(6);
      expect(await service.getAccompanyRelationIds('alice')).toEqual(['bob', 'carol', 'dave']);
      expect(await service.getAccompanyRelationIds('bob')).toEqual(['alice']);
    });

    it('should keep existing relations as they are', async () => {
      relations.add('alice', 'bob', 'FRIEND');

      const created = await service.createDefaultRelations('alice');

      expect(created).toBe(5);
      expect(await service.isFriend('alice', 'bob')).toBe(true);
    });
  });
});
