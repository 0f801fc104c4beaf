import { z } from 'zod';
import { definePlugin, defineAction } from '../../sdk/types.js';
import { microsoftOAuthProvider } from '../../../auth/providers/microsoft.js';
import { invokeErrorFromStatus } from '../../../errors/index.js';
import { fetchWithTimeout, readJsonObject, vendorErrorMessage } from '../../../http/index.js';
import { asRecord, asString } from '../../sdk/values.js';
import { jsonMessage, type ActionContext } from '../../../types/index.js';

export const GRAPH_API = 'https://graph.microsoft.com/v1.0';

function getAccessToken(ctx: ActionContext): string {
  const token = ctx.credentials.access_token ?? ctx.env.MICROSOFT_ACCESS_TOKEN;
  if (!token) {
    throw invokeErrorFromStatus(401, 'Microsoft access_token required; connect the account through OAuth first.');
  }
  return token;
}

async function graphGet(token: string, path: string): Promise<Record<string, unknown>> {
  const response = await fetchWithTimeout(`${GRAPH_API}${path}`, {
    headers: { Authorization: `Bearer ${token}`, Accept: 'application/json' },
  });
  const data = await readJsonObject(response);
  if (!response.ok) {
    throw invokeErrorFromStatus(
      response.status,
      `Microsoft Graph error (${response.status}): ${vendorErrorMessage(data, response.statusText)}`
    );
  }
  return data;
}

const listFilesSchema = z.object({
  // Folder path under the drive root; empty means the root itself
  path: z.string().default(''),
  limit: z.number().int().min(1).max(200).default(50),
});

export default definePlugin({
  name: 'microsoft',
  version: '1.0.0',
  description: 'Microsoft Graph profile and OneDrive listing',
  oauth: microsoftOAuthProvider,

  actions: [
    defineAction({
      name: 'get_profile',
      description: 'Get the signed-in user',
      async execute(ctx) {
        const me = await graphGet(getAccessToken(ctx), '/me');
        return [
          jsonMessage({
            id: asString(me.id) ?? null,
            display_name: asString(me.displayName) ?? null,
            mail: asString(me.mail) ?? asString(me.userPrincipalName) ?? null,
          }),
        ];
      },
    }),

    defineAction({
      name: 'list_files',
      description: 'List the children of a OneDrive folder',
      schema: listFilesSchema,
      async execute(ctx) {
        const token = getAccessToken(ctx);
        const { path, limit } = listFilesSchema.parse(ctx.config);

        const folder = path.replace(/^\/+|\/+$/g, '');
        const base = folder ? `/me/drive/root:/${encodeURI(folder)}:/children` : '/me/drive/root/children';
        const data = await graphGet(token, `${base}?$top=${limit}`);

        const files = (Array.isArray(data.value) ? data.value : []).map((item) => {
          const entry = asRecord(item);
          return {
            id: asString(entry.id) ?? '',
            name: asString(entry.name) ?? '',
            size: typeof entry.size === 'number' ? entry.size : 0,
            folder: 'folder' in entry,
            web_url: asString(entry.webUrl) ?? null,
          };
        });
        return [jsonMessage({ files })];
      },
    }),
  ],
});
