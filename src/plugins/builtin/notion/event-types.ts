export const SUPPORTED_EVENT_TYPES = [
  'page.created',
  'page.deleted',
  'page.undeleted',
  'page.content_updated',
  'page.moved',
  'page.properties_updated',
  'page.locked',
  'page.unlocked',
  'database.created',
  'database.content_updated',
  'database.deleted',
  'database.undeleted',
  'database.moved',
  'database.schema_updated',
  'data_source.created',
  'data_source.deleted',
  'data_source.undeleted',
  'data_source.moved',
  'data_source.content_updated',
  'data_source.schema_updated',
  'comment.created',
  'comment.updated',
  'comment.deleted',
] as const;

export type NotionEventType = (typeof SUPPORTED_EVENT_TYPES)[number];

export function isSupportedEventType(value: string): value is NotionEventType {
  return SUPPORTED_EVENT_TYPES.some((type) => type === value);
}
