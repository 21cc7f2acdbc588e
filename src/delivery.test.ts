import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, mock } from 'node:test';
import axios from 'axios';
import { DEFAULT_OUTPUT_FILE, buildSlackPayload, resolveOutputPath, sendToSlack, writeMarkdownFile } from './delivery';
import { NO_ISSUES_MARKDOWN } from './report';
import { fakeHttp } from './test-support/fake-http';

const WEBHOOK = 'https://hooks.slack.test/services/T000/B000/placeholder';
const TRUNCATION = '...\n```\n(Content truncated due to size limits)';

describe('resolveOutputPath', () => {
  it('prefers the command line flag', () => {
    assert.equal(resolveOutputPath('out/report.md', { MARKDOWN_OUTPUT_PATH: 'env.md', GITHUB_ACTIONS: 'true' }), 'out/report.md');
  });

  it('falls back to MARKDOWN_OUTPUT_PATH', () => {
    assert.equal(resolveOutputPath(undefined, { MARKDOWN_OUTPUT_PATH: 'env.md', GITHUB_ACTIONS: 'true' }), 'env.md');
  });

  it('writes into the workspace on GitHub Actions', () => {
    assert.equal(
      resolveOutputPath(undefined, { GITHUB_ACTIONS: 'true', GITHUB_WORKSPACE: '/work' }),
      path.join('/work', DEFAULT_OUTPUT_FILE),
    );
    assert.equal(resolveOutputPath(undefined, { GITHUB_ACTIONS: 'true' }), path.join(os.tmpdir(), DEFAULT_OUTPUT_FILE));
  });

  it('defaults to markdown-result.md', () => {
    assert.equal(resolveOutputPath(undefined, {}), 'markdown-result.md');
  });
});

describe('buildSlackPayload', () => {
  it('summarizes with the first heading and wraps the report in a code block', () => {
    const payload = buildSlackPayload(NO_ISSUES_MARKDOWN);

    assert.deepEqual(payload, {
      text: ':white_check_mark: No Issues Found',
      blocks: [
        {
          type: 'section',
          text: { type: 'mrkdwn', text: `*:white_check_mark: No Issues Found*\n\n\`\`\`\n${NO_ISSUES_MARKDOWN}\n\`\`\`` },
        },
      ],
    });
  });

  it('uses a generic summary without a heading', () => {
    assert.equal(buildSlackPayload('plain text').text, 'Git Monitoring Results');
  });

  it('truncates long reports', () => {
    const content = 'x'.repeat(4000);
    const [block] = buildSlackPayload(content).blocks;

    assert.equal(block.text.text.length, 2950 + TRUNCATION.length);
    assert.ok(block.text.text.startsWith('*Git Monitoring Results*\n\n```\nxxx'));
    assert.ok(block.text.text.endsWith(`x${TRUNCATION}`));
  });
});

describe('delivery side effects', () => {
  let logs: unknown[];
  let dir: string;

  beforeEach(() => {
    logs = [];
    mock.method(console, 'log', (message: unknown) => {
      logs.push(message);
    });
    mock.method(console, 'error', () => undefined);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'git-policy-monitor-'));
  });

  afterEach(() => {
    mock.restoreAll();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('writeMarkdownFile', () => {
    it('creates missing directories and writes an owner-only file', () => {
      const target = path.join(dir, 'reports', 'result.md');

      assert.equal(writeMarkdownFile(target, NO_ISSUES_MARKDOWN), true);

      assert.equal(fs.readFileSync(target, 'utf8'), NO_ISSUES_MARKDOWN);
      assert.equal(fs.statSync(target).mode & 0o777, 0o600);
      assert.deepEqual(logs, [`\n📝 Markdown results written to ${target}`]);
    });

    it('falls back to the file name in the working directory', () => {
      const blocker = path.join(dir, 'not-a-directory');
      fs.writeFileSync(blocker, '');
      const previous = process.cwd();
      process.chdir(dir);

      try {
        assert.equal(writeMarkdownFile(path.join(blocker, 'result.md'), 'report'), true);
        assert.equal(fs.readFileSync(path.join(dir, 'result.md'), 'utf8'), 'report');
      } finally {
        process.chdir(previous);
      }
    });
  });

  describe('sendToSlack', () => {
    it('posts the payload to the webhook', async () => {
      const http = fakeHttp({ [WEBHOOK]: () => ({ status: 200, data: 'ok' }) });

      const sent = await sendToSlack(WEBHOOK, NO_ISSUES_MARKDOWN, axios.create({ adapter: http.adapter }));

      assert.equal(sent, true);
      assert.equal(http.requests.length, 1);
      assert.equal(http.requests[0].method, 'post');
      assert.deepEqual(JSON.parse(String(http.requests[0].data)), buildSlackPayload(NO_ISSUES_MARKDOWN));
    });

    it('is false when Slack rejects the message', async () => {
      const http = fakeHttp({ [WEBHOOK]: () => ({ status: 400, data: 'invalid_payload' }) });

      assert.equal(await sendToSlack(WEBHOOK, 'report', axios.create({ adapter: http.adapter })), false);
    });

    it('refuses webhooks that are not https', async () => {
      const http = fakeHttp({});

      assert.equal(await sendToSlack('http://hooks.slack.test/services/x', 'report', axios.create({ adapter: http.adapter })), false);
      assert.equal(http.requests.length, 0);
    });
  });
});
