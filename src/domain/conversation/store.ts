import { Pool } from 'pg';
import { query, queryMany, queryOne } from '../../infra/db/client';
import { DatabaseError } from '../../shared/errors';
import { AssessmentStage, ConversationDocument, Evidence, Message, MessageRole } from '../../shared/types';

// ============================================================================
// Document Store Contract
// ============================================================================

export interface ConversationFilter {
  conversationId?: string;
  userId?: string;
  excludeStages?: AssessmentStage[];
}

export interface FindOptions {
  sortBy?: 'updatedAt' | 'createdAt';
  direction?: 'asc' | 'desc';
  limit?: number;
}

export interface ConversationPatch {
  /** Appended to the end of the message sequence. */
  push?: Message;
  /** Union-merged into the stored evidence; keys are never removed. */
  mergeEvidence?: Evidence;
  /** `updatedAt` only ever moves forward. */
  set?: Partial<Pick<
    ConversationDocument,
    'title' | 'lastMessage' | 'updatedAt' | 'assessmentStage' | 'needsDiagnosis'
  >>;
}

/**
 * Durable conversation storage. Implementations throw on any failure;
 * absence is reported through null / zero counts.
 */
export interface ConversationStore {
  findOne(filter: ConversationFilter): Promise<ConversationDocument | null>;
  find(filter: ConversationFilter, options?: FindOptions): Promise<ConversationDocument[]>;
  insertOne(doc: ConversationDocument): Promise<string>;
  updateOne(filter: ConversationFilter, patch: ConversationPatch): Promise<number>;
  deleteOne(filter: ConversationFilter): Promise<number>;
}

// ============================================================================
// PostgreSQL implementation
// ============================================================================

interface ConversationRow {
  conversation_id: string;
  user_id: string;
  title: string;
  messages: Array<{ role: MessageRole; content: string; timestamp: string; messageId?: string }>;
  last_message: string;
  created_at: Date;
  updated_at: Date;
  assessment_stage: AssessmentStage;
  symptoms_collected: Evidence;
  needs_diagnosis: boolean;
}

const COLUMNS = `conversation_id, user_id, title, messages, last_message, created_at,
  updated_at, assessment_stage, symptoms_collected, needs_diagnosis`;

const SORT_COLUMNS: Record<NonNullable<FindOptions['sortBy']>, string> = {
  updatedAt: 'updated_at',
  createdAt: 'created_at',
};

export class PostgresConversationStore implements ConversationStore {
  constructor(private db: Pool) {}

  async findOne(filter: ConversationFilter): Promise<ConversationDocument | null> {
    const params: unknown[] = [];
    const where = this.buildWhere(filter, params);

    const row = await queryOne<ConversationRow>(
      this.db,
      `SELECT ${COLUMNS} FROM conversations WHERE ${where} LIMIT 1`,
      params
    );

    return row ? this.toDocument(row) : null;
  }

  async find(filter: ConversationFilter, options: FindOptions = {}): Promise<ConversationDocument[]> {
    const params: unknown[] = [];
    const where = this.buildWhere(filter, params);
    const column = SORT_COLUMNS[options.sortBy ?? 'updatedAt'];
    const direction = options.direction === 'asc' ? 'ASC' : 'DESC';

    let sql = `SELECT ${COLUMNS} FROM conversations WHERE ${where} ORDER BY ${column} ${direction}`;
    if (options.limit !== undefined) {
      params.push(options.limit);
      sql += ` LIMIT $${params.length}`;
    }

    const rows = await queryMany<ConversationRow>(this.db, sql, params);
    return rows.map((row) => this.toDocument(row));
  }

  async insertOne(doc: ConversationDocument): Promise<string> {
    await query(
      this.db,
      `INSERT INTO conversations (${COLUMNS})
       VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7, $8, $9::jsonb, $10)`,
      [
        doc.conversationId,
        doc.userId,
        doc.title,
        JSON.stringify(doc.messages.map((m) => this.toStoredMessage(m))),
        doc.lastMessage,
        doc.createdAt,
        doc.updatedAt,
        doc.assessmentStage,
        JSON.stringify(doc.symptomsCollected),
        doc.needsDiagnosis,
      ]
    );

    return doc.conversationId;
  }

  async updateOne(filter: ConversationFilter, patch: ConversationPatch): Promise<number> {
    const params: unknown[] = [];
    const assignments: string[] = [];
    const bind = (value: unknown): string => {
      params.push(value);
      return `$${params.length}`;
    };

    if (patch.push) {
      assignments.push(`messages = messages || ${bind(JSON.stringify([this.toStoredMessage(patch.push)]))}::jsonb`);
    }
    if (patch.mergeEvidence) {
      assignments.push(`symptoms_collected = symptoms_collected || ${bind(JSON.stringify(patch.mergeEvidence))}::jsonb`);
    }

    const set = patch.set ?? {};
    if (set.title !== undefined) assignments.push(`title = ${bind(set.title)}`);
    if (set.lastMessage !== undefined) assignments.push(`last_message = ${bind(set.lastMessage)}`);
    if (set.updatedAt !== undefined) assignments.push(`updated_at = GREATEST(updated_at, ${bind(set.updatedAt)})`);
    if (set.assessmentStage !== undefined) assignments.push(`assessment_stage = ${bind(set.assessmentStage)}`);
    if (set.needsDiagnosis !== undefined) assignments.push(`needs_diagnosis = ${bind(set.needsDiagnosis)}`);

    if (assignments.length === 0) {
      return 0;
    }

    const where = this.buildWhere(filter, params);
    const result = await query(
      this.db,
      `UPDATE conversations SET ${assignments.join(', ')}
       WHERE conversation_id = (SELECT conversation_id FROM conversations WHERE ${where} LIMIT 1)`,
      params
    );

    return result.rowCount ?? 0;
  }

  async deleteOne(filter: ConversationFilter): Promise<number> {
    const params: unknown[] = [];
    const where = this.buildWhere(filter, params);

    const result = await query(
      this.db,
      `DELETE FROM conversations
       WHERE conversation_id = (SELECT conversation_id FROM conversations WHERE ${where} LIMIT 1)`,
      params
    );

    return result.rowCount ?? 0;
  }

  private buildWhere(filter: ConversationFilter, params: unknown[]): string {
    const clauses: string[] = [];

    if (filter.conversationId !== undefined) {
      params.push(filter.conversationId);
      clauses.push(`conversation_id = $${params.length}`);
    }
    if (filter.userId !== undefined) {
      params.push(filter.userId);
      clauses.push(`user_id = $${params.length}`);
    }
    if (filter.excludeStages && filter.excludeStages.length > 0) {
      params.push(filter.excludeStages);
      clauses.push(`assessment_stage <> ALL($${params.length}::text[])`);
    }

    if (clauses.length === 0) {
      throw new DatabaseError('Refusing to run an unfiltered conversation query');
    }

    return clauses.join(' AND ');
  }

  private toStoredMessage(message: Message): ConversationRow['messages'][number] {
    return {
      role: message.role,
      content: message.content,
      timestamp: message.timestamp.toISOString(),
      ...(message.messageId ? { messageId: message.messageId } : {}),
    };
  }

  private toDocument(row: ConversationRow): ConversationDocument {
    return {
      conversationId: row.conversation_id,
      userId: row.user_id,
      title: row.title,
      messages: (row.messages || []).map((m) => ({
        role: m.role,
        content: m.content,
        timestamp: new Date(m.timestamp),
        messageId: m.messageId,
      })),
      lastMessage: row.last_message,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      assessmentStage: row.assessment_stage,
      symptomsCollected: row.symptoms_collected || {},
      needsDiagnosis: row.needs_diagnosis,
    };
  }
}
