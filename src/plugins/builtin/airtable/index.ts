import { definePlugin } from '../../sdk/types.js';
import { airtableOAuthProvider } from '../../../auth/providers/airtable.js';
import { airtableWebhookTrigger } from './trigger.js';

export default definePlugin({
  name: 'airtable',
  version: '1.0.0',
  description: 'Airtable record webhooks',
  triggers: [airtableWebhookTrigger],
  oauth: airtableOAuthProvider,
});
