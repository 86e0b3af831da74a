import type { Queryable } from '../db/types.js';
import type { Member, MemberId } from '../types/models.js';

export interface MemberRepository {
  save(member: Member): Promise<Member>;
  findById(id: MemberId): Promise<Member | null>;
  findAllIds(): Promise<MemberId[]>;
}

interface MemberRow {
  id: string;
  full_name: string;
  created_at: Date;
}

export class PgMemberRepository implements MemberRepository {
  constructor(private readonly db: Queryable) {}

  async save(member: Member): Promise<Member> {
    const result = await this.db.query<MemberRow>(
      `INSERT INTO members (id, full_name, created_at)
       VALUES ($1, $2, $3)
       ON CONFLICT (id) DO UPDATE SET full_name = EXCLUDED.full_name
       RETURNING id, full_name, created_at`,
      [member.id, member.fullName, member.createdAt]
    );
    return this.mapRowToMember(result.rows[0]);
  }

  async findById(id: MemberId): Promise<Member | null> {
    const result = await this.db.query<MemberRow>(
      `SELECT id, full_name, created_at FROM members WHERE id = $1`,
      [id]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return this.mapRowToMember(result.rows[0]);
  }

  async findAllIds(): Promise<MemberId[]> {
    const result = await this.db.query<{ id: string }>(`SELECT id FROM members ORDER BY created_at ASC, id ASC`);
    return result.rows.map((row) => row.id);
  }

  private mapRowToMember(row: MemberRow): Member {
    return {
      id: row.id,
      fullName: row.full_name,
      createdAt: row.created_at,
    };
  }
}
