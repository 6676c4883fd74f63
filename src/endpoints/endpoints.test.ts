import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NuclinoClient } from '../core/client.js';
import { AuthenticationError, ServerError } from '../error/httpError.js';
import { File } from '../models/file.js';
import { Team } from '../models/team.js';
import { User } from '../models/user.js';
import { Workspace } from '../models/workspace.js';
import { FileEndpoints } from './file.js';
import { TeamEndpoints } from './team.js';
import { UserEndpoints } from './user.js';
import { WorkspaceEndpoints } from './workspace.js';

const fetchMock = vi.fn<typeof fetch>();

function reply(data: unknown) {
  fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ status: 'success', data }), { status: 200 }));
}

function sentUrl(call = 0): string {
  return String(fetchMock.mock.calls[call]?.[0]);
}

function createClient() {
  return new NuclinoClient({
    apiKey: 'test-key',
    baseUrl: 'https://api.example.com/v0',
    logger: pino({ level: 'silent' }),
  });
}

describe('endpoints', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  describe('UserEndpoints', () => {
    it('fetches a user', async () => {
      reply({ object: 'user', id: 'u1', firstName: 'Ada', lastName: 'Lovelace' });

      const [err, user] = await new UserEndpoints(createClient()).getUser('u1');

      expect(err).toBeNull();
      expect(user).toBeInstanceOf(User);
      expect(user?.describe()).toBe('<User "Ada Lovelace">');
      expect(sentUrl()).toBe('https://api.example.com/v0/users/u1');
    });

    it('passes authentication failures through', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response(JSON.stringify({ status: 'fail', message: 'Invalid API key' }), { status: 401 }),
      );

      const [err] = await new UserEndpoints(createClient()).getUser('u1');

      expect(err).toBeInstanceOf(AuthenticationError);
      expect(err?.message).toBe('Invalid API key');
    });
  });

  describe('TeamEndpoints', () => {
    it('lists teams with pagination', async () => {
      reply({ object: 'list', results: [{ object: 'team', id: 't1', name: 'Acme' }] });

      const [err, teams] = await new TeamEndpoints(createClient()).getTeams({ limit: 1, after: 't0' });

      expect(err).toBeNull();
      expect(teams).toHaveLength(1);
      expect(teams?.[0]).toBeInstanceOf(Team);
      expect(sentUrl()).toBe('https://api.example.com/v0/teams?limit=1&after=t0');
    });

    it('lists teams without a query string by default', async () => {
      reply({ object: 'list', results: [] });

      const [err, teams] = await new TeamEndpoints(createClient()).getTeams();

      expect(err).toBeNull();
      expect(teams).toEqual([]);
      expect(sentUrl()).toBe('https://api.example.com/v0/teams');
    });

    it('fetches a team', async () => {
      reply({ object: 'team', id: 't1', name: 'Acme' });

      const [, team] = await new TeamEndpoints(createClient()).getTeam('t1');

      expect(team?.name).toBe('Acme');
      expect(sentUrl()).toBe('https://api.example.com/v0/teams/t1');
    });
  });

  describe('WorkspaceEndpoints', () => {
    it('lists the workspaces of a team', async () => {
      reply({ object: 'list', results: [{ object: 'workspace', id: 'w1', name: 'Docs' }] });

      const [err, workspaces] = await new WorkspaceEndpoints(createClient()).getWorkspaces({ teamId: 't1' });

      expect(err).toBeNull();
      expect(workspaces?.[0]).toBeInstanceOf(Workspace);
      expect(sentUrl()).toBe('https://api.example.com/v0/workspaces?teamId=t1');
    });

    it('fetches a workspace', async () => {
      reply({ object: 'workspace', id: 'w1', name: 'Docs', childIds: ['i1'] });

      const [, workspace] = await new WorkspaceEndpoints(createClient()).getWorkspace('w1');

      expect(workspace?.childIds).toEqual(['i1']);
      expect(sentUrl()).toBe('https://api.example.com/v0/workspaces/w1');
    });

    it('rejects a payload of another type', async () => {
      reply({ object: 'team', id: 't1' });

      const [err] = await new WorkspaceEndpoints(createClient()).getWorkspace('w1');

      expect(err).toBeInstanceOf(ServerError);
      expect(err?.message).toBe('Unexpected response data, expected workspace');
    });
  });

  describe('FileEndpoints', () => {
    it('fetches a file with its download link', async () => {
      reply({
        object: 'file',
        id: 'f1',
        itemId: 'i1',
        fileName: 'diagram.png',
        download: { url: 'https://files.example.com/f1', expiresAt: '2024-01-01T00:00:00.000Z' },
      });

      const [err, file] = await new FileEndpoints(createClient()).getFile('f1');

      expect(err).toBeNull();
      expect(file).toBeInstanceOf(File);
      expect(file?.download?.url).toBe('https://files.example.com/f1');
      expect(sentUrl()).toBe('https://api.example.com/v0/files/f1');
    });
  });
});
