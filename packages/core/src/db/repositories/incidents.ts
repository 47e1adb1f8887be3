/**
 * Incidents Repository
 *
 * Persistence for dispatched incidents. Doubles as the IncidentLogSink the
 * dispatch layer writes progress and terminal outcomes to.
 */

import { desc, eq } from 'drizzle-orm';
import type {
  Incident,
  IncidentCompletion,
  IncidentID,
  IncidentLogSink,
  IncidentStatus,
} from '../../types';
import { NotFoundError } from '../../utils/errors';
import type { Database } from '../client';
import { type IncidentInsert, type IncidentRow, incidents } from '../schema';

export interface CreateIncidentInput {
  incident_id: IncidentID;
  task: string;
  status?: IncidentStatus;
}

export class IncidentRepository implements IncidentLogSink {
  constructor(private db: Database) {}

  /**
   * Convert database row to Incident type
   */
  private rowToIncident(row: IncidentRow): Incident {
    return {
      incident_id: row.incident_id,
      status: row.status,
      task: row.task,
      session_id: row.session_id,
      full_log: row.full_log,
      response: row.response,
      tokens_used: row.tokens_used,
      execution_time_ms: row.execution_time_ms,
      created_at: row.created_at.toISOString(),
      updated_at: row.updated_at.toISOString(),
      completed_at: row.completed_at ? row.completed_at.toISOString() : undefined,
    };
  }

  async create(input: CreateIncidentInput): Promise<Incident> {
    const now = new Date();
    const row: IncidentInsert = {
      incident_id: input.incident_id,
      task: input.task,
      status: input.status ?? 'pending',
      created_at: now,
      updated_at: now,
    };
    const [inserted] = await this.db.insert(incidents).values(row).returning();
    return this.rowToIncident(inserted);
  }

  async findById(incidentId: IncidentID): Promise<Incident | null> {
    const row = await this.db
      .select()
      .from(incidents)
      .where(eq(incidents.incident_id, incidentId))
      .get();
    return row ? this.rowToIncident(row) : null;
  }

  async getById(incidentId: IncidentID): Promise<Incident> {
    const incident = await this.findById(incidentId);
    if (!incident) {
      throw new NotFoundError('Incident', incidentId);
    }
    return incident;
  }

  /**
   * Most recently created first
   */
  async findAll(limit = 50): Promise<Incident[]> {
    const rows = await this.db
      .select()
      .from(incidents)
      .orderBy(desc(incidents.created_at))
      .limit(limit)
      .all();
    return rows.map(row => this.rowToIncident(row));
  }

  async markRunning(incidentId: IncidentID, task?: string): Promise<void> {
    await this.db
      .update(incidents)
      .set({ status: 'running', updated_at: new Date(), ...(task !== undefined ? { task } : {}) })
      .where(eq(incidents.incident_id, incidentId))
      .run();
  }

  /**
   * Store the accumulated progress log. Creates the row when the incident
   * is unknown so worker output is never dropped.
   */
  async updateLog(incidentId: IncidentID, fullLog: string): Promise<void> {
    const now = new Date();
    await this.db
      .insert(incidents)
      .values({
        incident_id: incidentId,
        status: 'running',
        full_log: fullLog,
        created_at: now,
        updated_at: now,
      })
      .onConflictDoUpdate({
        target: incidents.incident_id,
        set: { full_log: fullLog, updated_at: now },
      })
      .run();
  }

  async markCompleted(incidentId: IncidentID, outcome: IncidentCompletion): Promise<void> {
    const now = new Date();
    await this.db
      .update(incidents)
      .set({
        status: 'completed',
        session_id: outcome.session_id,
        response: outcome.response,
        tokens_used: outcome.tokens_used,
        execution_time_ms: outcome.execution_time_ms,
        completed_at: now,
        updated_at: now,
      })
      .where(eq(incidents.incident_id, incidentId))
      .run();
  }

  async markFailed(incidentId: IncidentID, response: string): Promise<void> {
    const now = new Date();
    await this.db
      .update(incidents)
      .set({ status: 'failed', response, completed_at: now, updated_at: now })
      .where(eq(incidents.incident_id, incidentId))
      .run();
  }
}
