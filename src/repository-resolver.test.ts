import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it, mock } from 'node:test';
import { ConfigurationError } from './errors';
import { resolveRepositories } from './repository-resolver';
import { FakeGitHubClient, repository } from './test-support/fake-github-client';

describe('resolveRepositories', () => {
  let client: FakeGitHubClient;

  beforeEach(() => {
    client = new FakeGitHubClient();
    mock.method(console, 'log', () => undefined);
  });

  afterEach(() => {
    mock.restoreAll();
  });

  const settings = {
    repoVisibility: 'all',
    organization: '',
    specificRepositories: [],
    excludedRepositories: [],
  };

  it('uses the configured list as-is for specific visibility', async () => {
    const resolution = await resolveRepositories(client, {
      ...settings,
      repoVisibility: 'specific',
      organization: 'acme',
      specificRepositories: ['acme/widgets', 'not-a-repo'],
      excludedRepositories: ['acme/widgets'],
    });

    assert.deepEqual(resolution, { ok: true, repositories: ['acme/widgets', 'not-a-repo'] });
    assert.deepEqual(client.calls, []);
  });

  it('lists organization repositories and drops excluded ones', async () => {
    client.organizationRepositories.acme = [
      repository('acme', 'widgets'),
      repository('acme', 'gadgets'),
      repository('acme', 'legacy'),
    ];

    const resolution = await resolveRepositories(client, {
      ...settings,
      repoVisibility: 'public-only',
      organization: 'acme',
      excludedRepositories: ['acme/legacy', 'other/widgets'],
    });

    assert.deepEqual(resolution, { ok: true, repositories: ['acme/widgets', 'acme/gadgets'] });
    assert.deepEqual(client.callsTo('listOrganizationRepositories'), [
      { operation: 'listOrganizationRepositories', target: 'acme', visibility: 'public-only' },
    ]);
  });

  it('lists the authenticated user repositories without an organization', async () => {
    client.userRepositories = [repository('dev-one', 'dotfiles', { private: true }), repository('acme', 'widgets')];

    const resolution = await resolveRepositories(client, { ...settings, repoVisibility: 'private-only' });

    assert.deepEqual(resolution, { ok: true, repositories: ['dev-one/dotfiles', 'acme/widgets'] });
    assert.deepEqual(client.callsTo('listUserRepositories'), [
      { operation: 'listUserRepositories', target: 'user', visibility: 'private-only' },
    ]);
  });

  it('fails the whole listing on an unknown visibility', async () => {
    const resolution = await resolveRepositories(client, { ...settings, repoVisibility: 'secret' });

    assert.equal(resolution.ok, false);
    if (!resolution.ok) {
      assert.equal(resolution.failure.repository, 'all-repositories');
      assert.ok(resolution.failure.error instanceof ConfigurationError);
      assert.equal(resolution.failure.error.kind, 'invalid-visibility');
      assert.deepEqual(resolution.failure.unapprovedPRs, []);
    }
    assert.deepEqual(client.calls, []);
  });

  it('names the organization when its listing fails', async () => {
    client.failures.listOrganizationRepositories = new Error('boom');

    const resolution = await resolveRepositories(client, { ...settings, organization: 'acme' });

    assert.equal(resolution.ok, false);
    if (!resolution.ok) {
      assert.equal(resolution.failure.repository, 'org:acme');
      assert.equal(resolution.failure.error?.message, 'Failed to fetch organization repositories: boom');
    }
  });

  it('reports a failed user listing', async () => {
    client.failures.listUserRepositories = new Error('boom');

    const resolution = await resolveRepositories(client, settings);

    assert.equal(resolution.ok, false);
    if (!resolution.ok) {
      assert.equal(resolution.failure.repository, 'user-repositories');
      assert.equal(resolution.failure.error?.message, 'Failed to fetch user repositories: boom');
    }
  });
});
