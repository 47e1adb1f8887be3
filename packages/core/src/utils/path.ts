/**
 * Path helpers for the triage home directory, database URLs and
 * per-incident workspaces.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { ValidationError } from './errors';

/**
 * Expand a leading `~/` (optionally behind a `file:` prefix) to the home
 * directory. Remote URLs and absolute paths come back unchanged.
 *
 * @example
 * ```typescript
 * expandPath('~/.triage/triage.db')      → '/home/ops/.triage/triage.db'
 * expandPath('file:~/.triage/triage.db') → 'file:/home/ops/.triage/triage.db'
 * expandPath('libsql://db.example.com')  → 'libsql://db.example.com'
 * ```
 */
export function expandPath(path: string): string {
  if (path.startsWith('file:~/')) {
    return `file:${join(homedir(), path.slice(7))}`;
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Filesystem path behind a local database URL (drops `file:`, expands `~`)
 */
export function extractDbFilePath(dbUrl: string): string {
  const expanded = expandPath(dbUrl);
  return expanded.startsWith('file:') ? expanded.slice(5) : expanded;
}

/**
 * True for URLs that point at a local SQLite file rather than a remote
 * libSQL server or an in-memory database
 */
export function isLocalDbUrl(dbUrl: string): boolean {
  if (dbUrl === ':memory:' || dbUrl === 'file::memory:') {
    return false;
  }
  return !/^[a-z]+:\/\//i.test(dbUrl);
}

/**
 * Root directory for triage state (`~/.triage` unless TRIAGE_HOME is set)
 */
export function getTriageHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.TRIAGE_HOME ? expandPath(env.TRIAGE_HOME) : join(homedir(), '.triage');
}

const INCIDENT_DIR_PATTERN = /^[A-Za-z0-9._-]+$/;

/**
 * Working directory for one incident's agent runs.
 *
 * Incident ids become directory names, so anything that could escape the
 * base directory is rejected.
 */
export function resolveIncidentWorkspace(baseDir: string, incidentId: string): string {
  if (!INCIDENT_DIR_PATTERN.test(incidentId) || incidentId === '.' || incidentId === '..') {
    throw new ValidationError(`invalid incident id for workspace: ${incidentId}`, 'incident_id');
  }
  return join(expandPath(baseDir), incidentId);
}
