// Markdown subset to Atlassian Document Format: headings, nested lists,
// paragraphs, and bold/italic/link/code inline marks.

export type AdfMark =
  | { type: 'strong' }
  | { type: 'em' }
  | { type: 'code' }
  | { type: 'link'; attrs: { href: string } };

export interface AdfText {
  type: 'text';
  text: string;
  marks?: AdfMark[];
}

export interface AdfParagraph {
  type: 'paragraph';
  content: AdfText[];
}

export interface AdfHeading {
  type: 'heading';
  attrs: { level: number };
  content: AdfText[];
}

export interface AdfList {
  type: 'bulletList' | 'orderedList';
  content: AdfListItem[];
}

export interface AdfListItem {
  type: 'listItem';
  content: Array<AdfParagraph | AdfList>;
}

export type AdfBlock = AdfParagraph | AdfHeading | AdfList;

export interface AdfDocument {
  version: 1;
  type: 'doc';
  content: AdfBlock[];
}

type BlockToken =
  | { type: 'heading'; depth: number; value: string }
  | { type: 'listItem'; indent: number; marker: string; value: string }
  | { type: 'paragraph'; value: string };

const HEADING = /^(#{1,6})\s+(.*)$/;
const LIST_ITEM = /^(\s*)([-*+]|\d+\.)\s+(.*)$/;
const ORDERED_MARKER = /^\d+\./;

const INLINE_RULES: Array<{ pattern: RegExp; toNode: (match: RegExpMatchArray) => AdfText }> = [
  { pattern: /^\*\*([^*]+)\*\*/, toNode: (m) => ({ type: 'text', text: m[1], marks: [{ type: 'strong' }] }) },
  { pattern: /^\*([^*]+)\*/, toNode: (m) => ({ type: 'text', text: m[1], marks: [{ type: 'em' }] }) },
  {
    pattern: /^\[([^\]]+)\]\(([^)]+)\)/,
    toNode: (m) => ({ type: 'text', text: m[1], marks: [{ type: 'link', attrs: { href: m[2] } }] }),
  },
  { pattern: /^`([^`]+)`/, toNode: (m) => ({ type: 'text', text: m[1], marks: [{ type: 'code' }] }) },
];

const MARKUP_START = /^(\*\*|\*|\[|`)/;

export function inlineToAdf(text: string): AdfText[] {
  const nodes: AdfText[] = [];
  let index = 0;

  outer: while (index < text.length) {
    const rest = text.slice(index);
    for (const rule of INLINE_RULES) {
      const match = rest.match(rule.pattern);
      if (match) {
        nodes.push(rule.toNode(match));
        index += match[0].length;
        continue outer;
      }
    }

    // Plain text runs to the next markup character; the first character is
    // always consumed so an unmatched `*` or `[` becomes text.
    let end = index + 1;
    while (end < text.length && !MARKUP_START.test(text.slice(end))) {
      end++;
    }
    const run = text.slice(index, end);
    if (run.trim()) {
      nodes.push({ type: 'text', text: run });
    }
    index = end;
  }

  return nodes;
}

function tokenize(source: string): BlockToken[] {
  const tokens: BlockToken[] = [];
  let paragraph: string[] = [];

  const flush = () => {
    if (paragraph.length > 0) {
      tokens.push({ type: 'paragraph', value: paragraph.join(' ') });
      paragraph = [];
    }
  };

  for (const line of source.split(/\r?\n/)) {
    if (line.trim() === '') {
      flush();
      continue;
    }

    const heading = line.match(HEADING);
    if (heading) {
      flush();
      tokens.push({ type: 'heading', depth: heading[1].length, value: heading[2].trim() });
      continue;
    }

    const item = line.match(LIST_ITEM);
    if (item) {
      flush();
      tokens.push({ type: 'listItem', indent: item[1].length, marker: item[2], value: item[3] });
      continue;
    }

    paragraph.push(line);
  }

  flush();
  return tokens;
}

interface OpenList {
  list: AdfList;
  indent: number;
}

function closeList(stack: OpenList[], content: AdfBlock[]): void {
  const finished = stack.pop();
  if (!finished) return;

  const parent = stack[stack.length - 1];
  const lastItem = parent?.list.content[parent.list.content.length - 1];
  if (lastItem) {
    lastItem.content.push(finished.list);
  } else {
    content.push(finished.list);
  }
}

function closeAllLists(stack: OpenList[], content: AdfBlock[]): void {
  while (stack.length > 0) {
    closeList(stack, content);
  }
}

export function markdownToAdf(source: string): AdfDocument {
  const content: AdfBlock[] = [];
  const stack: OpenList[] = [];

  for (const token of tokenize(source)) {
    switch (token.type) {
      case 'heading':
        closeAllLists(stack, content);
        content.push({
          type: 'heading',
          attrs: { level: token.depth },
          content: token.value ? [{ type: 'text', text: token.value }] : [],
        });
        break;

      case 'paragraph':
        closeAllLists(stack, content);
        content.push({ type: 'paragraph', content: inlineToAdf(token.value) });
        break;

      case 'listItem': {
        while (stack.length > 0 && stack[stack.length - 1].indent > token.indent) {
          closeList(stack, content);
        }
        let current = stack[stack.length - 1];
        if (!current || current.indent !== token.indent) {
          current = {
            list: { type: ORDERED_MARKER.test(token.marker) ? 'orderedList' : 'bulletList', content: [] },
            indent: token.indent,
          };
          stack.push(current);
        }
        current.list.content.push({
          type: 'listItem',
          content: [{ type: 'paragraph', content: inlineToAdf(token.value) }],
        });
        break;
      }
    }
  }

  closeAllLists(stack, content);
  return { version: 1, type: 'doc', content };
}
