import { homedir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { ValidationError } from './errors';
import {
  expandPath,
  extractDbFilePath,
  getTriageHome,
  isLocalDbUrl,
  resolveIncidentWorkspace,
} from './path';

describe('expandPath', () => {
  it('expands ~/ to home directory', () => {
    expect(expandPath('~/.triage/triage.db')).toBe(join(homedir(), '.triage', 'triage.db'));
  });

  it('expands file:~/ to file: + home directory', () => {
    expect(expandPath('file:~/.triage/triage.db')).toBe(
      `file:${join(homedir(), '.triage', 'triage.db')}`
    );
  });

  it('returns absolute paths and remote URLs unchanged', () => {
    expect(expandPath('/var/lib/triage.db')).toBe('/var/lib/triage.db');
    expect(expandPath('libsql://db.example.com')).toBe('libsql://db.example.com');
  });

  it('does not expand a bare tilde', () => {
    expect(expandPath('~')).toBe('~');
  });
});

describe('extractDbFilePath', () => {
  it('strips file: and expands tilde', () => {
    expect(extractDbFilePath('file:~/.triage/triage.db')).toBe(
      join(homedir(), '.triage', 'triage.db')
    );
    expect(extractDbFilePath('file:/var/lib/triage.db')).toBe('/var/lib/triage.db');
  });
});

describe('isLocalDbUrl', () => {
  it('recognises local files', () => {
    expect(isLocalDbUrl('file:~/.triage/triage.db')).toBe(true);
    expect(isLocalDbUrl('/var/lib/triage.db')).toBe(true);
  });

  it('rejects memory and remote URLs', () => {
    expect(isLocalDbUrl(':memory:')).toBe(false);
    expect(isLocalDbUrl('libsql://db.example.com')).toBe(false);
  });
});

describe('getTriageHome', () => {
  it('defaults to ~/.triage', () => {
    expect(getTriageHome({})).toBe(join(homedir(), '.triage'));
  });

  it('honours TRIAGE_HOME', () => {
    expect(getTriageHome({ TRIAGE_HOME: '/srv/triage' })).toBe('/srv/triage');
  });
});

describe('resolveIncidentWorkspace', () => {
  it('joins the incident id under the base directory', () => {
    expect(resolveIncidentWorkspace('/srv/ws', 'inc-42')).toBe('/srv/ws/inc-42');
  });

  it('rejects ids that would escape the base directory', () => {
    expect(() => resolveIncidentWorkspace('/srv/ws', '../etc')).toThrow(ValidationError);
    expect(() => resolveIncidentWorkspace('/srv/ws', '..')).toThrow(ValidationError);
    expect(() => resolveIncidentWorkspace('/srv/ws', 'a/b')).toThrow(ValidationError);
  });
});
