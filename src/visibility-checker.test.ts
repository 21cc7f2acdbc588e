import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it, mock } from 'node:test';
import { ConfigurationError, RateLimitWaitError, isCancellation } from './errors';
import { FakeGitHubClient, NOW, event, hoursAgo, repository } from './test-support/fake-github-client';
import { VisibilityChecker } from './visibility-checker';

describe('VisibilityChecker', () => {
  let client: FakeGitHubClient;
  let errors: unknown[];

  beforeEach(() => {
    client = new FakeGitHubClient();
    errors = [];
    mock.method(console, 'log', () => undefined);
    mock.method(console, 'error', (message: unknown) => {
      errors.push(message);
    });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  const checker = (checkWindowHours = 24) => new VisibilityChecker(client, { checkWindowHours, now: () => NOW });
  const eventFetches = () => client.callsTo('listRepositoryEvents').map((call) => `${call.target}@${call.page}`);

  describe('checkOrganization', () => {
    it('reports a public repository created inside the window without reading its events', async () => {
      client.organizationRepositories.acme = [repository('acme', 'fresh', { createdAt: hoursAgo(2) })];

      const findings = await checker().checkOrganization('acme', 'public-only');

      assert.deepEqual(findings, ['acme/fresh']);
      assert.deepEqual(eventFetches(), []);
    });

    it('treats a repository without a creation time as new', async () => {
      client.organizationRepositories.acme = [repository('acme', 'undated', { createdAt: null })];

      assert.deepEqual(await checker().checkOrganization('acme', 'all'), ['acme/undated']);
      assert.deepEqual(eventFetches(), []);
    });

    it('reports an older repository with a recent PublicEvent', async () => {
      client.organizationRepositories.acme = [repository('acme', 'opened')];
      client.eventPages['acme/opened'] = [[event('PushEvent', hoursAgo(1)), event('PublicEvent', hoursAgo(3))]];

      assert.deepEqual(await checker().checkOrganization('acme', 'public-only'), ['acme/opened']);
    });

    it('stops reading events at the first one older than the window', async () => {
      client.organizationRepositories.acme = [repository('acme', 'steady')];
      client.eventPages['acme/steady'] = [
        [event('PushEvent', hoursAgo(1)), event('WatchEvent', hoursAgo(30)), event('PublicEvent', hoursAgo(2))],
        [event('PublicEvent', hoursAgo(2))],
      ];

      assert.deepEqual(await checker().checkOrganization('acme', 'public-only'), []);
      assert.deepEqual(eventFetches(), ['acme/steady@1']);
    });

    it('follows event pages while events stay recent', async () => {
      client.organizationRepositories.acme = [repository('acme', 'busy')];
      client.eventPages['acme/busy'] = [[event('PushEvent', null)], [event('PublicEvent', hoursAgo(5))]];

      assert.deepEqual(await checker().checkOrganization('acme', 'public-only'), ['acme/busy']);
      assert.deepEqual(eventFetches(), ['acme/busy@1', 'acme/busy@2']);
    });

    it('skips private repositories', async () => {
      client.organizationRepositories.acme = [repository('acme', 'secret', { private: true, createdAt: hoursAgo(1) })];

      assert.deepEqual(await checker().checkOrganization('acme', 'all'), []);
    });

    it('lists public repositories only for public-only and specific', async () => {
      await checker().checkOrganization('acme', 'public-only');
      await checker().checkOrganization('acme', 'specific');
      await checker().checkOrganization('acme', 'all');

      assert.deepEqual(
        client.callsTo('listOrganizationRepositories').map((call) => call.visibility),
        ['public-only', 'public-only', 'all'],
      );
    });

    it('finds nothing for private-only', async () => {
      client.organizationRepositories.acme = [
        repository('acme', 'fresh', { createdAt: hoursAgo(2) }),
        repository('acme', 'secret', { private: true, createdAt: hoursAgo(2) }),
      ];

      assert.deepEqual(await checker().checkOrganization('acme', 'private-only'), []);
      assert.deepEqual(eventFetches(), []);
    });

    it('logs and skips a repository whose events cannot be read', async () => {
      client.organizationRepositories.acme = [repository('acme', 'broken'), repository('acme', 'fresh', { createdAt: hoursAgo(2) })];
      client.failures.listRepositoryEvents = new Error('boom');

      assert.deepEqual(await checker().checkOrganization('acme', 'public-only'), ['acme/fresh']);
      assert.deepEqual(errors, ['❌ Error checking events for acme/broken: boom']);
    });

    it('honours the configured window', async () => {
      client.organizationRepositories.acme = [repository('acme', 'weekly', { createdAt: hoursAgo(100) })];

      assert.deepEqual(await checker(24).checkOrganization('acme', 'public-only'), []);
      assert.deepEqual(await checker(168).checkOrganization('acme', 'public-only'), ['acme/weekly']);
    });
  });

  describe('run', () => {
    it('collects findings across organizations', async () => {
      client.organizationRepositories.acme = [repository('acme', 'fresh', { createdAt: hoursAgo(2) })];
      client.organizationRepositories.globex = [repository('globex', 'launch', { createdAt: hoursAgo(3) })];

      assert.deepEqual(await checker().run(['acme', 'globex'], 'public-only'), {
        findings: ['acme/fresh', 'globex/launch'],
        failedOrganizations: [],
      });
    });

    it('rejects an unknown visibility', async () => {
      await assert.rejects(checker().run(['acme'], 'secret'), (error: unknown) => {
        assert.ok(error instanceof ConfigurationError);
        assert.equal(error.kind, 'invalid-visibility');
        return true;
      });
      assert.deepEqual(client.calls, []);
    });

    it('reports organizations that cannot be listed and carries on', async () => {
      client.failures.listOrganizationRepositories = new Error('boom');

      assert.deepEqual(await checker().run(['acme', 'globex'], 'all'), {
        findings: [],
        failedOrganizations: [
          { organization: 'acme', message: 'Failed to list organization repositories: boom' },
          { organization: 'globex', message: 'Failed to list organization repositories: boom' },
        ],
      });
      assert.deepEqual(errors, [
        '❌ Error checking organization acme: Failed to list organization repositories: boom',
        '❌ Error checking organization globex: Failed to list organization repositories: boom',
      ]);
    });

    it('aborts on cancellation', async () => {
      client.failures.listOrganizationRepositories = new RateLimitWaitError(new Error('stop'));

      await assert.rejects(checker().run(['acme', 'globex'], 'all'), (error: unknown) => isCancellation(error));
      assert.equal(client.callsTo('listOrganizationRepositories').length, 1);
    });
  });

  describe('checkRepository', () => {
    it('is true for a repository created inside the window', async () => {
      client.organizationRepositories.acme = [repository('acme', 'fresh', { createdAt: hoursAgo(2) })];
      assert.equal(await checker().checkRepository('acme', 'fresh'), true);
    });

    it('falls back to the event history', async () => {
      client.organizationRepositories.acme = [repository('acme', 'opened')];
      client.eventPages['acme/opened'] = [[event('PublicEvent', hoursAgo(4))]];
      assert.equal(await checker().checkRepository('acme', 'opened'), true);
    });

    it('is false for a repository that is not public', async () => {
      assert.equal(await checker().checkRepository('acme', 'missing'), false);
    });
  });

  it('falls back to a 24 hour window', async () => {
    client.organizationRepositories.acme = [
      repository('acme', 'day-old', { createdAt: hoursAgo(23) }),
      repository('acme', 'two-days-old', { createdAt: hoursAgo(48) }),
    ];

    assert.deepEqual(await checker(0).checkOrganization('acme', 'public-only'), ['acme/day-old']);
  });
});
