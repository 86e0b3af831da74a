import type { Queryable } from '../db/types.js';
import { isUniqueViolation } from '../db/types.js';
import { RelationAlreadyExistsError } from '../errors/domain-errors.js';
import type { MemberId, MemberRelation, RelationType } from '../types/models.js';

export interface MemberRelationRepository {
  findByFromId(fromId: MemberId): Promise<MemberId[]>;
  findFriendsByFromId(fromId: MemberId): Promise<MemberId[]>;
  findAccompanyByFromId(fromId: MemberId): Promise<MemberId[]>;
  isFriend(fromId: MemberId, toId: MemberId): Promise<boolean>;
  findRandomOfFriend(memberId: MemberId, limit: number): Promise<MemberId[]>;
  findRandomOfAccompany(memberId: MemberId, limit: number): Promise<MemberId[]>;
  findByFromIdAndToId(fromId: MemberId, toId: MemberId): Promise<MemberRelation | null>;
  /** Insert, or update the relation type of an existing row with the same id */
  save(relation: MemberRelation): Promise<MemberRelation>;
  /**
   * Write `relation`'s type and timestamp only while the stored row still has
   * `expected` as its type. Returns null when no row matched.
   */
  updateRelationType(relation: MemberRelation, expected: RelationType): Promise<MemberRelation | null>;
  /** Insert new relations in batches; pairs that already exist are skipped */
  saveAllNew(relations: readonly MemberRelation[]): Promise<number>;
}

// Postgres caps a statement at 65535 bind parameters; 5 per row
const INSERT_BATCH_SIZE = 1000;

interface MemberRelationRow {
  id: string;
  from_id: string;
  to_id: string;
  relation_type: RelationType;
  updated_at: Date;
}

export class PgMemberRelationRepository implements MemberRelationRepository {
  constructor(private readonly db: Queryable) {}

  async findByFromId(fromId: MemberId): Promise<MemberId[]> {
    const result = await this.db.query<{ to_id: string }>(
      `SELECT to_id FROM member_relations WHERE from_id = $1 ORDER BY created_at ASC, to_id ASC`,
      [fromId]
    );
    return result.rows.map((row) => row.to_id);
  }

  findFriendsByFromId(fromId: MemberId): Promise<MemberId[]> {
    return this.findByFromIdAndRelationType(fromId, 'FRIEND');
  }

  findAccompanyByFromId(fromId: MemberId): Promise<MemberId[]> {
    return this.findByFromIdAndRelationType(fromId, 'ACCOMPANY');
  }

  async isFriend(fromId: MemberId, toId: MemberId): Promise<boolean> {
    const result = await this.db.query(
      `SELECT 1 FROM member_relations
       WHERE from_id = $1 AND to_id = $2 AND relation_type = 'FRIEND'`,
      [fromId, toId]
    );
    return result.rows.length > 0;
  }

  findRandomOfFriend(memberId: MemberId, limit: number): Promise<MemberId[]> {
    return this.findRandomByRelationType(memberId, 'FRIEND', limit);
  }

  findRandomOfAccompany(memberId: MemberId, limit: number): Promise<MemberId[]> {
    return this.findRandomByRelationType(memberId, 'ACCOMPANY', limit);
  }

  async findByFromIdAndToId(fromId: MemberId, toId: MemberId): Promise<MemberRelation | null> {
    const result = await this.db.query<MemberRelationRow>(
      `SELECT id, from_id, to_id, relation_type, updated_at
       FROM member_relations WHERE from_id = $1 AND to_id = $2`,
      [fromId, toId]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return this.mapRowToRelation(result.rows[0]);
  }

  async save(relation: MemberRelation): Promise<MemberRelation> {
    try {
      const result = await this.db.query<MemberRelationRow>(
        `INSERT INTO member_relations (id, from_id, to_id, relation_type, updated_at)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (id) DO UPDATE SET
           relation_type = EXCLUDED.relation_type,
           updated_at = EXCLUDED.updated_at
         RETURNING id, from_id, to_id, relation_type, updated_at`,
        [relation.id, relation.fromId, relation.toId, relation.relation, relation.lastUpdatedAt]
      );
      return this.mapRowToRelation(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error, 'member_relations_from_to_key')) {
        throw new RelationAlreadyExistsError(relation.fromId, relation.toId);
      }
      throw error;
    }
  }

  async updateRelationType(relation: MemberRelation, expected: RelationType): Promise<MemberRelation | null> {
    const result = await this.db.query<MemberRelationRow>(
      `UPDATE member_relations
       SET relation_type = $2, updated_at = $3
       WHERE id = $1 AND relation_type = $4
       RETURNING id, from_id, to_id, relation_type, updated_at`,
      [relation.id, relation.relation, relation.lastUpdatedAt, expected]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return this.mapRowToRelation(result.rows[0]);
  }

  async saveAllNew(relations: readonly MemberRelation[]): Promise<number> {
    let created = 0;
    for (let start = 0; start < relations.length; start += INSERT_BATCH_SIZE) {
      created += await this.insertBatch(relations.slice(start, start + INSERT_BATCH_SIZE));
    }
    return created;
  }

  private async insertBatch(relations: readonly MemberRelation[]): Promise<number> {
    const values: unknown[] = [];
    const tuples = relations.map((relation, index) => {
      const base = index * 5;
      values.push(relation.id, relation.fromId, relation.toId, relation.relation, relation.lastUpdatedAt);
      return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5})`;
    });

    const result = await this.db.query(
      `INSERT INTO member_relations (id, from_id, to_id, relation_type, updated_at)
       VALUES ${tuples.join(', ')}
       ON CONFLICT (from_id, to_id) DO NOTHING`,
      values
    );
    return result.rowCount ?? 0;
  }

  private async findByFromIdAndRelationType(fromId: MemberId, relationType: RelationType): Promise<MemberId[]> {
    const result = await this.db.query<{ to_id: string }>(
      `SELECT to_id FROM member_relations
       WHERE from_id = $1 AND relation_type = $2
       ORDER BY created_at ASC, to_id ASC`,
      [fromId, relationType]
    );
    return result.rows.map((row) => row.to_id);
  }

  private async findRandomByRelationType(
    memberId: MemberId,
    relationType: RelationType,
    limit: number
  ): Promise<MemberId[]> {
    const result = await this.db.query<{ to_id: string }>(
      `SELECT to_id FROM member_relations
       WHERE from_id = $1 AND relation_type = $2
       ORDER BY random()
       LIMIT $3`,
      [memberId, relationType, limit]
    );
    return result.rows.map((row) => row.to_id);
  }

  private mapRowToRelation(row: MemberRelationRow): MemberRelation {
    return {
      id: row.id,
      fromId: row.from_id,
      toId: row.to_id,
      relation: row.relation_type,
      lastUpdatedAt: row.updated_at,
    };
  }
}
