import chalk from 'chalk';
import { readFile } from 'node:fs/promises';
import { computeNotionSignature } from '../../plugins/builtin/notion/trigger.js';
import { computeAirtableMac } from '../../plugins/builtin/airtable/api.js';
import { computeZendeskSignature } from '../../plugins/builtin/zendesk/api.js';
import { computeTwilioSignature } from '../../plugins/builtin/twilio/api.js';

export const SIGNING_VENDORS = ['notion', 'airtable', 'zendesk', 'twilio'] as const;
export type SigningVendor = (typeof SIGNING_VENDORS)[number];

export interface SignInput {
  secret: string;
  body: string;
  /** Zendesk signs the timestamp along with the body. */
  timestamp?: string;
  /** Twilio signs the full webhook URL. */
  url?: string;
}

export function isSigningVendor(value: string): value is SigningVendor {
  return SIGNING_VENDORS.some((vendor) => vendor === value);
}

/**
 * The headers a vendor would attach to `body`, for exercising a webhook
 * endpoint by hand.
 */
export function signatureHeaders(vendor: SigningVendor, input: SignInput): Record<string, string> {
  switch (vendor) {
    case 'notion':
      return { 'X-Notion-Signature': computeNotionSignature(input.body, input.secret) };
    case 'airtable':
      return { 'X-Airtable-Content-MAC': computeAirtableMac(input.body, input.secret) };
    case 'zendesk': {
      const timestamp = input.timestamp ?? new Date().toISOString();
      return {
        'X-Zendesk-Webhook-Signature': computeZendeskSignature(timestamp, input.body, input.secret),
        'X-Zendesk-Webhook-Signature-Timestamp': timestamp,
      };
    }
    case 'twilio': {
      if (!input.url) {
        throw new Error('Twilio signatures need --url');
      }
      const form = Object.fromEntries(new URLSearchParams(input.body));
      return { 'X-Twilio-Signature': computeTwilioSignature(input.url, form, input.secret) };
    }
  }
}

interface SignOptions {
  secret: string;
  file: string;
  timestamp?: string;
  url?: string;
}

export async function signCommand(vendor: string, options: SignOptions): Promise<void> {
  if (!isSigningVendor(vendor)) {
    console.error(chalk.red(`Unknown vendor: ${vendor} (expected ${SIGNING_VENDORS.join(', ')})`));
    process.exit(1);
  }

  const body = await readFile(options.file, 'utf-8');
  const headers = signatureHeaders(vendor, {
    secret: options.secret,
    body,
    timestamp: options.timestamp,
    url: options.url,
  });
  for (const [name, value] of Object.entries(headers)) {
    console.log(`${name}: ${value}`);
  }
}
