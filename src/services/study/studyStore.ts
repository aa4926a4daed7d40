import type { Pool, PoolClient } from 'pg';
import { transaction } from '../database/postgres';
import { AppError, NotFoundError, PersistenceError, errorMessage } from '../../utils/errors';
import type {
  DeletedModule,
  NewModule,
  NewSession,
  Recommendation,
  StudyModule,
  StudySession
} from './types';

export interface StudyStoreOptions {
  db?: Pool;
  useInMemory?: boolean;
}

interface ModuleRow {
  id: number;
  name: string;
  target_hours: number;
  exam_date: string | null;
  created_at: Date;
  studied_hours: number;
}

interface SessionRow {
  id: number;
  module_id: number;
  module_name: string | null;
  duration: number;
  date: string;
  notes: string | null;
  created_at: Date;
}

interface RecommendationRow {
  id: number;
  recommendation_text: string;
  created_at: Date;
}

type StoredModule = Omit<StudyModule, 'studiedHours'>;
type StoredSession = Omit<StudySession, 'moduleName'>;

const MODULE_SELECT = `
  SELECT m.id, m.name, m.target_hours, to_char(m.exam_date, 'YYYY-MM-DD') AS exam_date, m.created_at,
         COALESCE(SUM(s.duration), 0) AS studied_hours
  FROM modules m
  LEFT JOIN study_sessions s ON s.module_id = m.id`;

// module_name is resolved by join at read time; it is null once the module is gone
const SESSION_SELECT = `
  SELECT s.id, s.module_id, m.name AS module_name, s.duration, to_char(s.date, 'YYYY-MM-DD') AS date,
         s.notes, s.created_at
  FROM study_sessions s
  LEFT JOIN modules m ON m.id = s.module_id`;

const RECOMMENDATION_COLUMNS = 'id, recommendation_text, created_at';

function mapModuleRow(row: ModuleRow): StudyModule {
  return {
    id: row.id,
    name: row.name,
    targetHours: row.target_hours,
    examDate: row.exam_date,
    createdAt: row.created_at,
    studiedHours: row.studied_hours
  };
}

function mapSessionRow(row: SessionRow): StudySession {
  return {
    id: row.id,
    moduleId: row.module_id,
    moduleName: row.module_name,
    duration: row.duration,
    date: row.date,
    notes: row.notes ?? '',
    createdAt: row.created_at
  };
}

function mapRecommendationRow(row: RecommendationRow): Recommendation {
  return {
    id: row.id,
    text: row.recommendation_text,
    createdAt: row.created_at
  };
}

function newestSessionFirst(a: StudySession, b: StudySession): number {
  if (a.date !== b.date) return a.date < b.date ? 1 : -1;
  return b.id - a.id;
}

/**
 * Persistence for modules, study sessions and recommendations.
 *
 * Backed by PostgreSQL when a pool is given, otherwise by process memory with
 * the same ordering and cascade rules. Every write runs in one transaction;
 * driver failures surface as PersistenceError after the rollback.
 */
export class StudyStore {
  private readonly db?: Pool;
  private readonly useInMemory: boolean;
  private modules = new Map<number, StoredModule>();
  private sessions = new Map<number, StoredSession>();
  private recommendations: Recommendation[] = [];
  private nextId = { module: 1, session: 1, recommendation: 1 };

  constructor(options: StudyStoreOptions = {}) {
    this.db = options.db;
    this.useInMemory = Boolean(options.useInMemory || !options.db);
  }

  get mode(): 'memory' | 'postgres' {
    return this.useInMemory ? 'memory' : 'postgres';
  }

  private async run<T>(operation: string, fn: (db: Pool) => Promise<T>): Promise<T> {
    if (!this.db) {
      throw new PersistenceError('Database not configured for StudyStore');
    }
    try {
      return await fn(this.db);
    } catch (err) {
      if (err instanceof AppError) throw err;
      throw new PersistenceError(`Failed to ${operation}: ${errorMessage(err)}`);
    }
  }

  private write<T>(operation: string, fn: (client: PoolClient) => Promise<T>): Promise<T> {
    return this.run(operation, (db) => transaction(db, fn));
  }

  private studiedHours(moduleId: number): number {
    let total = 0;
    for (const session of this.sessions.values()) {
      if (session.moduleId === moduleId) total += session.duration;
    }
    return total;
  }

  private withStudiedHours(module: StoredModule): StudyModule {
    return { ...module, studiedHours: this.studiedHours(module.id) };
  }

  private withModuleName(session: StoredSession): StudySession {
    return { ...session, moduleName: this.modules.get(session.moduleId)?.name ?? null };
  }

  // ---------------------------------------------------------------------------
  // Modules
  // ---------------------------------------------------------------------------

  async createModule(input: NewModule): Promise<StudyModule> {
    if (this.useInMemory) {
      const module: StoredModule = { id: this.nextId.module++, ...input, createdAt: new Date() };
      this.modules.set(module.id, module);
      return this.withStudiedHours(module);
    }

    const result = await this.write('create module', (client) =>
      client.query<ModuleRow>(
        `INSERT INTO modules (name, target_hours, exam_date)
         VALUES ($1, $2, $3)
         RETURNING id, name, target_hours, to_char(exam_date, 'YYYY-MM-DD') AS exam_date, created_at,
                   0::double precision AS studied_hours`,
        [input.name, input.targetHours, input.examDate]
      )
    );
    return mapModuleRow(result.rows[0]);
  }

  async listModules(): Promise<StudyModule[]> {
    if (this.useInMemory) {
      return [...this.modules.values()]
        .sort((a, b) => a.id - b.id)
        .map((module) => this.withStudiedHours(module));
    }

    const result = await this.run('list modules', (db) =>
      db.query<ModuleRow>(`${MODULE_SELECT} GROUP BY m.id ORDER BY m.id`)
    );
    return result.rows.map(mapModuleRow);
  }

  async getModule(id: number): Promise<StudyModule | null> {
    if (this.useInMemory) {
      const module = this.modules.get(id);
      return module ? this.withStudiedHours(module) : null;
    }

    const result = await this.run('load module', (db) =>
      db.query<ModuleRow>(`${MODULE_SELECT} WHERE m.id = $1 GROUP BY m.id`, [id])
    );
    return result.rows.length > 0 ? mapModuleRow(result.rows[0]) : null;
  }

  async listModuleSessions(moduleId: number): Promise<StudySession[]> {
    if (this.useInMemory) {
      return [...this.sessions.values()]
        .filter((session) => session.moduleId === moduleId)
        .sort((a, b) => a.id - b.id)
        .map((session) => this.withModuleName(session));
    }

    const result = await this.run('list module sessions', (db) =>
      db.query<SessionRow>(`${SESSION_SELECT} WHERE s.module_id = $1 ORDER BY s.id`, [moduleId])
    );
    return result.rows.map(mapSessionRow);
  }

  /**
   * Delete a module together with all of its sessions.
   * Returns null when the module does not exist.
   */
  async deleteModule(id: number): Promise<DeletedModule | null> {
    if (this.useInMemory) {
      const module = this.modules.get(id);
      if (!module) return null;

      let removedSessions = 0;
      for (const session of [...this.sessions.values()]) {
        if (session.moduleId === id) {
          this.sessions.delete(session.id);
          removedSessions++;
        }
      }
      this.modules.delete(id);
      return { name: module.name, removedSessions };
    }

    return this.write('delete module', async (client) => {
      const found = await client.query<{ name: string }>(
        'SELECT name FROM modules WHERE id = $1 FOR UPDATE',
        [id]
      );
      if (found.rows.length === 0) return null;

      const sessions = await client.query('DELETE FROM study_sessions WHERE module_id = $1', [id]);
      await client.query('DELETE FROM modules WHERE id = $1', [id]);
      return { name: found.rows[0].name, removedSessions: sessions.rowCount ?? 0 };
    });
  }

  // ---------------------------------------------------------------------------
  // Sessions
  // ---------------------------------------------------------------------------

  /**
   * Insert a session for an existing module.
   * Throws NotFoundError when the module is missing at write time.
   */
  async createSession(input: NewSession): Promise<StudySession> {
    if (this.useInMemory) {
      if (!this.modules.has(input.moduleId)) {
        throw new NotFoundError('Module not found');
      }
      const session: StoredSession = { id: this.nextId.session++, ...input, createdAt: new Date() };
      this.sessions.set(session.id, session);
      return this.withModuleName(session);
    }

    return this.write('create session', async (client) => {
      const parent = await client.query('SELECT id FROM modules WHERE id = $1 FOR SHARE', [input.moduleId]);
      if (parent.rows.length === 0) {
        throw new NotFoundError('Module not found');
      }

      const inserted = await client.query<{ id: number }>(
        `INSERT INTO study_sessions (module_id, duration, date, notes)
         VALUES ($1, $2, $3, $4)
         RETURNING id`,
        [input.moduleId, input.duration, input.date, input.notes]
      );
      const result = await client.query<SessionRow>(`${SESSION_SELECT} WHERE s.id = $1`, [
        inserted.rows[0].id
      ]);
      return mapSessionRow(result.rows[0]);
    });
  }

  /** Sessions with the most recent date first, optionally truncated. */
  async listSessions(limit?: number): Promise<StudySession[]> {
    if (this.useInMemory) {
      const sorted = [...this.sessions.values()]
        .map((session) => this.withModuleName(session))
        .sort(newestSessionFirst);
      return limit === undefined ? sorted : sorted.slice(0, limit);
    }

    const result = await this.run('list sessions', (db) =>
      limit === undefined
        ? db.query<SessionRow>(`${SESSION_SELECT} ORDER BY s.date DESC, s.id DESC`)
        : db.query<SessionRow>(`${SESSION_SELECT} ORDER BY s.date DESC, s.id DESC LIMIT $1`, [limit])
    );
    return result.rows.map(mapSessionRow);
  }

  /** Sessions whose date lies in [from, to], both inclusive. */
  async listSessionsBetween(from: string, to: string): Promise<StudySession[]> {
    if (this.useInMemory) {
      return [...this.sessions.values()]
        .filter((session) => session.date >= from && session.date <= to)
        .map((session) => this.withModuleName(session))
        .sort(newestSessionFirst);
    }

    const result = await this.run('list sessions by date range', (db) =>
      db.query<SessionRow>(
        `${SESSION_SELECT} WHERE s.date >= $1 AND s.date <= $2 ORDER BY s.date DESC, s.id DESC`,
        [from, to]
      )
    );
    return result.rows.map(mapSessionRow);
  }

  async deleteSession(id: number): Promise<boolean> {
    if (this.useInMemory) {
      return this.sessions.delete(id);
    }

    const result = await this.write('delete session', (client) =>
      client.query('DELETE FROM study_sessions WHERE id = $1', [id])
    );
    return (result.rowCount ?? 0) > 0;
  }

  // ---------------------------------------------------------------------------
  // Recommendations
  // ---------------------------------------------------------------------------

  async createRecommendation(text: string): Promise<Recommendation> {
    if (this.useInMemory) {
      const recommendation: Recommendation = {
        id: this.nextId.recommendation++,
        text,
        createdAt: new Date()
      };
      this.recommendations.push(recommendation);
      return recommendation;
    }

    const result = await this.write('store recommendation', (client) =>
      client.query<RecommendationRow>(
        `INSERT INTO ai_recommendations (recommendation_text)
         VALUES ($1)
         RETURNING ${RECOMMENDATION_COLUMNS}`,
        [text]
      )
    );
    return mapRecommendationRow(result.rows[0]);
  }

  async latestRecommendation(): Promise<Recommendation | null> {
    if (this.useInMemory) {
      let latest: Recommendation | null = null;
      for (const recommendation of this.recommendations) {
        if (
          !latest ||
          recommendation.createdAt.getTime() > latest.createdAt.getTime() ||
          (recommendation.createdAt.getTime() === latest.createdAt.getTime() && recommendation.id > latest.id)
        ) {
          latest = recommendation;
        }
      }
      return latest;
    }

    const result = await this.run('load latest recommendation', (db) =>
      db.query<RecommendationRow>(
        `SELECT ${RECOMMENDATION_COLUMNS}
         FROM ai_recommendations
         ORDER BY created_at DESC, id DESC
         LIMIT 1`
      )
    );
    return result.rows.length > 0 ? mapRecommendationRow(result.rows[0]) : null;
  }
}
