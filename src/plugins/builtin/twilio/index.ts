import { definePlugin } from '../../sdk/types.js';
import { twilioWebhookTrigger } from './trigger.js';

export default definePlugin({
  name: 'twilio',
  version: '1.0.0',
  description: 'Twilio SMS, WhatsApp and voice webhooks',
  triggers: [twilioWebhookTrigger],
});
