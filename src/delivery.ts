import axios from 'axios';
import type { AxiosInstance } from 'axios';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { errorMessage } from './errors';

export const DEFAULT_OUTPUT_FILE = 'markdown-result.md';
export const SLACK_TEXT_LIMIT = 3000;

const OUTPUT_START = '--- MARKDOWN_OUTPUT_START ---';
const OUTPUT_END = '--- MARKDOWN_OUTPUT_END ---';

export function resolveOutputPath(outputFlag: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  if (outputFlag) {
    return outputFlag;
  }
  if (env.MARKDOWN_OUTPUT_PATH) {
    return env.MARKDOWN_OUTPUT_PATH;
  }
  if (env.GITHUB_ACTIONS === 'true') {
    return path.join(env.GITHUB_WORKSPACE || os.tmpdir(), DEFAULT_OUTPUT_FILE);
  }
  return DEFAULT_OUTPUT_FILE;
}

export function printMarked(content: string): void {
  console.log(`\n${OUTPUT_START}`);
  console.log(content);
  console.log(OUTPUT_END);
}

/**
 * Write the report (owner read/write only). Falls back to the file name in the working
 * directory, then to marked console output. Returns whether a file was written.
 */
export function writeMarkdownFile(outputPath: string, content: string): boolean {
  try {
    const dir = path.dirname(outputPath);
    if (dir !== '.' && dir !== path.parse(dir).root) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o755 });
    }
    fs.writeFileSync(outputPath, content, { mode: 0o600 });
    console.log(`\n📝 Markdown results written to ${outputPath}`);
    return true;
  } catch (error) {
    console.error(`❌ Error writing markdown results to ${outputPath}: ${errorMessage(error)}`);
  }

  const fallbackPath = path.basename(outputPath);
  try {
    fs.writeFileSync(fallbackPath, content, { mode: 0o600 });
    console.log(`\n📝 Markdown results written to fallback location: ${fallbackPath}`);
    return true;
  } catch (error) {
    console.error(`❌ Error writing to fallback location ${fallbackPath}: ${errorMessage(error)}`);
  }

  printMarked(content);
  console.log("\nCouldn't write to file. Use the marked output above.");
  return false;
}

export interface SlackPayload {
  text: string;
  blocks: Array<{ type: 'section'; text: { type: 'mrkdwn'; text: string } }>;
}

export function buildSlackPayload(content: string): SlackPayload {
  const header = content.split('\n').find((line) => line.startsWith('## '));
  const summary = header ? header.slice(3) : 'Git Monitoring Results';

  let text = `*${summary}*\n\n\`\`\`\n${content}\n\`\`\``;
  if (text.length > SLACK_TEXT_LIMIT) {
    text = `${text.slice(0, SLACK_TEXT_LIMIT - 50)}...\n\`\`\`\n(Content truncated due to size limits)`;
  }

  return {
    text: summary,
    blocks: [{ type: 'section', text: { type: 'mrkdwn', text } }],
  };
}

function maskUrl(url: string): string {
  return url.length > 18 ? `${url.slice(0, 8)}...${url.slice(-10)}` : '(too short)';
}

export async function sendToSlack(webhookUrl: string, content: string, http: AxiosInstance = axios): Promise<boolean> {
  if (!webhookUrl.startsWith('https://')) {
    console.error('❌ Invalid Slack webhook URL: URL must begin with https://');
    return false;
  }

  const payload = buildSlackPayload(content);
  console.log(`📤 Sending results to Slack webhook ${maskUrl(webhookUrl)}`);

  try {
    const response = await http.post(webhookUrl, payload, {
      headers: { 'Content-Type': 'application/json' },
      validateStatus: () => true,
    });
    if (response.status !== 200) {
      console.error(`❌ Slack API error: ${response.status} - ${String(response.data)}`);
      return false;
    }
  } catch (error) {
    console.error(`❌ Error sending to Slack: ${errorMessage(error)}`);
    return false;
  }

  console.log('✅ Results sent to Slack');
  return true;
}
