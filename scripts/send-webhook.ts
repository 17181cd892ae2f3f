/**
 * Post a webhook payload to a running server, signed when a secret is set.
 *
 * Usage:
 *   npx tsx scripts/send-webhook.ts jira fixtures/jira-done.json
 *   npx tsx scripts/send-webhook.ts linear fixtures/linear-create.json --url http://localhost:5000
 *
 * Secrets come from JIRA_WEBHOOK_SECRET and LINEAR_WEBHOOK_SECRET.
 */

import { createHmac } from 'node:crypto';
import { readFile } from 'node:fs/promises';

import { ProviderNameSchema, errorMessage } from '@sprint-garden/core';
import { SIGNATURE_HEADERS } from '@sprint-garden/server';

const args = process.argv.slice(2);

if (args.length < 2 || args.includes('--help') || args.includes('-h')) {
  console.log(`
Usage: npx tsx scripts/send-webhook.ts <jira|linear> <payload.json> [--url <base-url>]

Options:
  --url <base-url>   Server base URL (default: http://localhost:\${PORT:-5000})
  --help, -h         Show this help message
`);
  process.exit(args.includes('--help') || args.includes('-h') ? 0 : 1);
}

const providerArg = ProviderNameSchema.safeParse(args[0]);
if (!providerArg.success) {
  console.error(`Unknown provider: "${args[0] ?? ''}". Use jira or linear.`);
  process.exit(1);
}
const provider = providerArg.data;
const payloadPath = args[1] ?? '';

const urlIndex = args.indexOf('--url');
const baseUrl = (urlIndex !== -1 && args[urlIndex + 1]) || `http://localhost:${process.env.PORT ?? '5000'}`;

const SECRETS = {
  jira: process.env.JIRA_WEBHOOK_SECRET,
  linear: process.env.LINEAR_WEBHOOK_SECRET,
};

async function main(): Promise<void> {
  const body = await readFile(payloadPath);
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };

  const secret = SECRETS[provider];
  if (secret) {
    const digest = createHmac('sha256', secret).update(body).digest('hex');
    headers[SIGNATURE_HEADERS[provider]] = provider === 'jira' ? `sha256=${digest}` : digest;
  }

  const url = new URL(`/webhooks/${provider}`, baseUrl);
  console.log(`POST ${url.toString()}${secret ? ' (signed)' : ''}`);

  const response = await fetch(url, { method: 'POST', headers, body: body.toString('utf-8') });
  console.log(`${response.status} ${response.statusText}`);
  console.log(await response.text());

  if (!response.ok) {
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Failed to send webhook:', errorMessage(err));
  process.exit(1);
});
