/**
 * Incidents Service
 *
 * REST + WebSocket API for dispatching incidents and reading their results.
 *
 * - create: record the incident and dispatch it (worker or in-process)
 * - patch: send a follow-up message into the incident's agent session
 * - remove: cancel a running incident
 *
 * Dispatch runs in the background; clients poll `get` for progress and the
 * final response.
 */

import { randomUUID } from 'node:crypto';
import type { IncidentRepository } from '@triage/core/db';
import { BadRequest, type Id, NotFound, type Params } from '@triage/core/feathers';
import type { Incident, IncidentCallbacks, IncidentID } from '@triage/core/types';
import { logError, NotFoundError } from '@triage/core/utils/errors';
import type { IncidentDispatcher } from '../dispatch/dispatcher';

export interface CreateIncidentData {
  incident_id?: string;
  task: string;
  enabled_skills?: string[];
}

export interface ContinueIncidentData {
  message: string;
}

export interface IncidentQuery {
  $limit?: number | string;
}

const DEFAULT_LIMIT = 50;

/**
 * Incident service class
 */
export class IncidentsService {
  constructor(
    private readonly repository: IncidentRepository,
    private readonly dispatcher: IncidentDispatcher
  ) {}

  async find(params?: Params<IncidentQuery>): Promise<Incident[]> {
    const raw = params?.query?.$limit;
    const limit = raw === undefined ? DEFAULT_LIMIT : Number(raw);
    if (!Number.isInteger(limit) || limit < 1) {
      throw new BadRequest('$limit must be a positive integer');
    }
    return this.repository.findAll(limit);
  }

  async get(id: Id, _params?: Params): Promise<Incident> {
    try {
      return await this.repository.getById(String(id));
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new NotFound(error.message);
      }
      throw error;
    }
  }

  async create(data: CreateIncidentData, _params?: Params): Promise<Incident> {
    if (typeof data.task !== 'string' || data.task.trim() === '') {
      throw new BadRequest('task is required');
    }
    const incidentId = data.incident_id ?? randomUUID();
    if ((await this.repository.findById(incidentId)) !== null) {
      throw new BadRequest(`Incident already exists: ${incidentId}`);
    }

    const incident = await this.repository.create({
      incident_id: incidentId,
      task: data.task,
      status: 'running',
    });
    console.log(`🚨 Incident ${incidentId} created`);

    this.dispatcher
      .start(incidentId, data.task, this.callbacksFor(incidentId), {
        enabledSkills: data.enabled_skills,
      })
      .catch(error => logError(error, 'incident dispatch', { incidentId }));

    return incident;
  }

  /**
   * Continue the incident's agent session with a follow-up message
   */
  async patch(id: Id | null, data: ContinueIncidentData, _params?: Params): Promise<Incident> {
    if (id === null) {
      throw new BadRequest('Bulk patch is not supported');
    }
    if (typeof data.message !== 'string' || data.message.trim() === '') {
      throw new BadRequest('message is required');
    }

    const incident = await this.get(id);
    if (incident.status === 'running') {
      throw new BadRequest(`Incident ${incident.incident_id} is still running`);
    }

    await this.repository.markRunning(incident.incident_id);
    const callbacks = this.callbacksFor(incident.incident_id);
    const dispatched = incident.session_id
      ? this.dispatcher.continue(incident.incident_id, incident.session_id, data.message, callbacks)
      : this.dispatcher.start(incident.incident_id, data.message, callbacks);
    dispatched.catch(error => logError(error, 'incident dispatch', { incidentId: incident.incident_id }));

    return this.get(incident.incident_id);
  }

  /**
   * Cancel a running incident. The incident itself is kept.
   */
  async remove(id: Id | null, _params?: Params): Promise<Incident> {
    if (id === null) {
      throw new BadRequest('Bulk remove is not supported');
    }
    const incident = await this.get(id);
    const cancelled = await this.dispatcher.cancel(incident.incident_id);
    console.log(
      cancelled
        ? `🛑 Cancel requested for incident ${incident.incident_id}`
        : `   Incident ${incident.incident_id} is not running`
    );
    return incident;
  }

  private callbacksFor(incidentId: IncidentID): IncidentCallbacks {
    return {
      onOutput: text => {
        this.repository
          .updateLog(incidentId, text)
          .catch(error => logError(error, 'incident log update', { incidentId }));
      },
      onCompleted: sessionId => {
        console.log(`✅ Incident ${incidentId} completed (session: ${sessionId || 'none'})`);
      },
      onError: message => {
        console.error(`❌ Incident ${incidentId} failed: ${message}`);
      },
    };
  }
}
