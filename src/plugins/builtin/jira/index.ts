import { z } from 'zod';
import { definePlugin, defineAction } from '../../sdk/types.js';
import { invokeErrorFromStatus } from '../../../errors/index.js';
import { basicAuth, fetchWithTimeout, readJsonObject } from '../../../http/index.js';
import { asStringArray, isRecord } from '../../sdk/values.js';
import { jsonMessage, textMessage, type ActionContext } from '../../../types/index.js';
import { markdownToAdf } from './adf.js';

interface JiraSite {
  baseUrl: string;
  authorization: string;
}

function getSite(ctx: ActionContext): JiraSite {
  const domain = ctx.credentials.domain ?? ctx.env.JIRA_DOMAIN;
  const email = ctx.credentials.email ?? ctx.env.JIRA_EMAIL;
  const apiToken = ctx.credentials.api_token ?? ctx.env.JIRA_API_TOKEN;
  if (!domain || !email || !apiToken) {
    throw invokeErrorFromStatus(401, 'Jira credentials required: domain, email and api_token (or JIRA_DOMAIN, JIRA_EMAIL, JIRA_API_TOKEN).');
  }

  const host = domain.replace(/^https?:\/\//, '').replace(/\/+$/, '');
  return { baseUrl: `https://${host}/rest/api/3`, authorization: basicAuth(email, apiToken) };
}

/**
 * Jira reports failures as `errorMessages` plus a per-field `errors` map.
 */
export function jiraErrorMessage(body: Record<string, unknown>, fallback: string): string {
  const messages = asStringArray(body.errorMessages);
  if (isRecord(body.errors)) {
    for (const [field, message] of Object.entries(body.errors)) {
      messages.push(`${field}: ${String(message)}`);
    }
  }
  return messages.length > 0 ? messages.join('; ') : fallback;
}

async function jiraApi(
  site: JiraSite,
  method: string,
  path: string,
  body?: unknown
): Promise<Record<string, unknown>> {
  const response = await fetchWithTimeout(`${site.baseUrl}${path}`, {
    method,
    headers: {
      Authorization: site.authorization,
      Accept: 'application/json',
      'Content-Type': 'application/json',
    },
    body: body === undefined ? undefined : JSON.stringify(body),
  });

  const data = await readJsonObject(response);
  if (!response.ok) {
    throw invokeErrorFromStatus(
      response.status,
      `Jira API error (${response.status}): ${jiraErrorMessage(data, response.statusText)}`
    );
  }
  return data;
}

const createIssueSchema = z.object({
  project_key: z.string().min(1),
  summary: z.string().min(1),
  issue_type: z.string().default('Task'),
  issue_type_id: z.string().optional(),
  description: z.string().optional(),
});

const addCommentSchema = z.object({
  issue_key: z.string().min(1),
  body: z.string().min(1),
});

const getIssueSchema = z.object({
  issue_key: z.string().min(1),
});

export default definePlugin({
  name: 'jira',
  version: '1.0.0',
  description: 'Create and read Jira Cloud issues, with Markdown converted to ADF',

  actions: [
    defineAction({
      name: 'create_issue',
      description: 'Create a Jira issue; the description is Markdown',
      schema: createIssueSchema,
      async execute(ctx) {
        const site = getSite(ctx);
        const params = createIssueSchema.parse(ctx.config);

        const fields: Record<string, unknown> = {
          project: { key: params.project_key },
          summary: params.summary,
          issuetype: params.issue_type_id ? { id: params.issue_type_id } : { name: params.issue_type },
        };
        if (params.description) {
          fields.description = markdownToAdf(params.description);
        }

        ctx.log(`Creating Jira issue in ${params.project_key}`);
        const result = await jiraApi(site, 'POST', '/issue', { fields });

        return [textMessage(`Successfully created Jira issue: ${String(result.key)}`), jsonMessage(result)];
      },
    }),

    defineAction({
      name: 'add_comment',
      description: 'Add a Markdown comment to a Jira issue',
      schema: addCommentSchema,
      async execute(ctx) {
        const site = getSite(ctx);
        const { issue_key, body } = addCommentSchema.parse(ctx.config);

        const result = await jiraApi(site, 'POST', `/issue/${encodeURIComponent(issue_key)}/comment`, {
          body: markdownToAdf(body),
        });
        return [jsonMessage(result)];
      },
    }),

    defineAction({
      name: 'get_issue',
      description: 'Get a Jira issue by key',
      schema: getIssueSchema,
      async execute(ctx) {
        const site = getSite(ctx);
        const { issue_key } = getIssueSchema.parse(ctx.config);

        return [jsonMessage({ issue: await jiraApi(site, 'GET', `/issue/${encodeURIComponent(issue_key)}`) })];
      },
    }),
  ],
});
