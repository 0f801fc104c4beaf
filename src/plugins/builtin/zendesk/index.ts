import { definePlugin } from '../../sdk/types.js';
import { zendeskOAuthProvider } from '../../../auth/providers/zendesk.js';
import { zendeskWebhookTrigger } from './trigger.js';

export default definePlugin({
  name: 'zendesk',
  version: '1.0.0',
  description: 'Zendesk ticket and article webhooks',
  triggers: [zendeskWebhookTrigger],
  oauth: zendeskOAuthProvider,
});
