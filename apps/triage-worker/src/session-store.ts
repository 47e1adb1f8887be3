/**
 * Session Store
 *
 * Per-incident agent sessions kept in a JSON file, so a continuation that
 * arrives without a session token can still resume the right session after
 * a worker restart.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { type IncidentID, IncidentStatus } from '@triage/core/types';
import { getErrorMessage, logError } from '@triage/core/utils/errors';

export interface WorkerSession {
  incident_id: IncidentID;
  /** Agent session token, empty until the agent issues one */
  session_id: string;
  status: IncidentStatus;
  started_at: string;
  updated_at: string;
  response?: string;
  full_log?: string;
}

function isSession(value: unknown): value is WorkerSession {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const statuses: readonly unknown[] = Object.values(IncidentStatus);
  return (
    'incident_id' in value &&
    typeof value.incident_id === 'string' &&
    'session_id' in value &&
    typeof value.session_id === 'string' &&
    'status' in value &&
    statuses.includes(value.status)
  );
}

export class SessionStore {
  private sessions = new Map<IncidentID, WorkerSession>();
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly storePath: string) {}

  /**
   * Load sessions from disk. A missing or unreadable file starts empty.
   */
  async load(): Promise<void> {
    let text: string;
    try {
      text = await readFile(this.storePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      console.warn(`⚠️  Ignoring corrupt session file ${this.storePath}: ${getErrorMessage(error)}`);
      return;
    }
    if (typeof parsed !== 'object' || parsed === null) {
      return;
    }

    for (const value of Object.values(parsed)) {
      if (isSession(value)) {
        this.sessions.set(value.incident_id, value);
      }
    }
    console.log(`📂 Loaded ${this.sessions.size} session(s) from ${this.storePath}`);
  }

  get(incidentId: IncidentID): WorkerSession | undefined {
    return this.sessions.get(incidentId);
  }

  list(): WorkerSession[] {
    return [...this.sessions.values()];
  }

  create(incidentId: IncidentID): Promise<WorkerSession> {
    const now = new Date().toISOString();
    const session: WorkerSession = {
      incident_id: incidentId,
      session_id: '',
      status: IncidentStatus.PENDING,
      started_at: now,
      updated_at: now,
    };
    this.sessions.set(incidentId, session);
    return this.persist().then(() => session);
  }

  setRunning(incidentId: IncidentID, sessionId: string): Promise<void> {
    return this.update(incidentId, session => {
      session.status = IncidentStatus.RUNNING;
      if (sessionId) {
        session.session_id = sessionId;
      }
    });
  }

  setCompleted(incidentId: IncidentID, response: string, fullLog: string): Promise<void> {
    return this.update(incidentId, session => {
      session.status = IncidentStatus.COMPLETED;
      session.response = response;
      session.full_log = fullLog;
    });
  }

  setFailed(incidentId: IncidentID, error: string): Promise<void> {
    return this.update(incidentId, session => {
      session.status = IncidentStatus.FAILED;
      session.response = error;
    });
  }

  delete(incidentId: IncidentID): Promise<void> {
    this.sessions.delete(incidentId);
    return this.persist();
  }

  private update(incidentId: IncidentID, mutate: (session: WorkerSession) => void): Promise<void> {
    const now = new Date().toISOString();
    let session = this.sessions.get(incidentId);
    if (!session) {
      session = {
        incident_id: incidentId,
        session_id: '',
        status: IncidentStatus.PENDING,
        started_at: now,
        updated_at: now,
      };
      this.sessions.set(incidentId, session);
    }
    mutate(session);
    session.updated_at = now;
    return this.persist();
  }

  /**
   * Write the whole map, one write at a time. Failures are logged; the
   * in-memory state stays authoritative.
   */
  private persist(): Promise<void> {
    const snapshot = JSON.stringify(Object.fromEntries(this.sessions), null, 2);
    this.writeChain = this.writeChain.then(async () => {
      try {
        await mkdir(dirname(this.storePath), { recursive: true });
        await writeFile(this.storePath, snapshot, 'utf-8');
      } catch (error) {
        logError(error, 'session store', { path: this.storePath });
      }
    });
    return this.writeChain;
  }
}
