import { marked, type Token, type Tokens } from 'marked';
import type { Theme } from '../config/loader.js';
import type { StyledLine, TextStyle } from './frame.js';

const RULE_WIDTH = 40;
const BULLET = '• ';
const QUOTE_BAR = '│ ';

// marked escapes these in inline text, codespan and image alt fields; code blocks and table cell text arrive raw.
const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity);
}

function headingColor(theme: Theme, depth: number): string {
  if (depth === 1) return theme.h1;
  if (depth === 2) return theme.h2;
  if (depth === 3) return theme.h3;
  return theme.h4to6;
}

function isList(token: Token): token is Tokens.List {
  return token.type === 'list' && 'items' in token;
}

function hasInline(token: Token): token is Tokens.Text & { tokens: Token[] } {
  return 'tokens' in token && Array.isArray(token.tokens);
}

function isTable(token: Token): token is Tokens.Table {
  return token.type === 'table' && 'header' in token && 'rows' in token;
}

class LineWriter {
  readonly lines: StyledLine[] = [];
  private current: StyledLine = [];

  write(text: string, style: TextStyle): void {
    const parts = text.split('\n');
    parts.forEach((part, index) => {
      if (index > 0) this.endLine();
      if (part) this.current.push({ text: part, style });
    });
  }

  endLine(): void {
    this.lines.push(this.current);
    this.current = [];
  }

  /** Ends the current line if anything was written to it. */
  flush(): void {
    if (this.current.length > 0) this.endLine();
  }

  blank(): void {
    this.flush();
    this.lines.push([]);
  }
}

/**
 * Turns markdown into styled lines for the preview pane. Block structure comes
 * from the marked lexer; colors come from the theme.
 */
export function renderMarkdown(markdown: string, theme: Theme): StyledLine[] {
  const writer = new LineWriter();
  renderBlocks(marked.lexer(markdown), writer, theme, true);
  writer.flush();
  return writer.lines;
}

function renderBlocks(tokens: readonly Token[], writer: LineWriter, theme: Theme, separate: boolean): void {
  let first = true;
  for (const token of tokens) {
    if (token.type === 'space') continue;
    if (separate && !first) writer.blank();
    first = false;
    renderBlock(token, writer, theme);
  }
}

function renderBlock(token: Token, writer: LineWriter, theme: Theme): void {
  switch (token.type) {
    case 'heading': {
      const style: TextStyle = { color: headingColor(theme, token.depth), bold: true };
      renderInline(token.tokens ?? [], writer, theme, style);
      writer.endLine();
      return;
    }
    case 'paragraph':
      renderInline(token.tokens ?? [], writer, theme, { color: theme.text });
      writer.endLine();
      return;
    case 'text':
      if (hasInline(token)) {
        renderInline(token.tokens, writer, theme, { color: theme.text });
      } else {
        writer.write(decodeEntities(token.text), { color: theme.text });
      }
      writer.flush();
      return;
    case 'code':
      for (const line of token.text.split('\n')) {
        writer.write(`  ${line}`, { color: theme.codeBlock });
        writer.endLine();
      }
      return;
    case 'blockquote':
      renderQuote(token.tokens ?? [], writer, theme);
      return;
    case 'list':
      if (isList(token)) renderList(token, writer, theme);
      return;
    case 'hr':
      writer.write('─'.repeat(RULE_WIDTH), { color: theme.metadata });
      writer.endLine();
      return;
    case 'table':
      if (isTable(token)) renderTable(token, writer, theme);
      return;
    case 'html':
      writer.write(token.text.trimEnd(), { color: theme.metadata, dim: true });
      writer.endLine();
      return;
    default:
      if ('text' in token && typeof token.text === 'string') {
        writer.write(decodeEntities(token.text), { color: theme.text });
        writer.flush();
      }
  }
}

function renderInline(tokens: readonly Token[], writer: LineWriter, theme: Theme, style: TextStyle): void {
  for (const token of tokens) {
    switch (token.type) {
      case 'strong':
        renderInline(token.tokens ?? [], writer, theme, { ...style, bold: true, color: theme.strong });
        break;
      case 'em':
        renderInline(token.tokens ?? [], writer, theme, { ...style, italic: true, color: theme.emphasis });
        break;
      case 'del':
        renderInline(token.tokens ?? [], writer, theme, {
          ...style,
          strikethrough: true,
          color: theme.strikethrough,
        });
        break;
      case 'codespan':
        writer.write(decodeEntities(token.text), { ...style, color: theme.code });
        break;
      case 'link':
        renderInline(token.tokens ?? [], writer, theme, { ...style, color: theme.link, underline: true });
        break;
      case 'image':
        writer.write(`[image: ${decodeEntities(token.text)}]`, { ...style, color: theme.link });
        break;
      case 'br':
        writer.endLine();
        break;
      case 'text':
        if (hasInline(token) && token.tokens.length > 0) {
          renderInline(token.tokens, writer, theme, style);
        } else {
          writer.write(decodeEntities(token.text), style);
        }
        break;
      default:
        if ('text' in token && typeof token.text === 'string') {
          writer.write(decodeEntities(token.text), style);
        }
    }
  }
}

function renderQuote(tokens: readonly Token[], writer: LineWriter, theme: Theme): void {
  const inner = new LineWriter();
  renderBlocks(tokens, inner, theme, true);
  inner.flush();
  const quoteStyle: TextStyle = { color: theme.blockquote, italic: true };
  for (const line of inner.lines) {
    writer.lines.push([
      { text: QUOTE_BAR, style: { color: theme.blockquote } },
      ...line.map((segment) => ({ text: segment.text, style: { ...segment.style, ...quoteStyle } })),
    ]);
  }
}

function renderList(list: Tokens.List, writer: LineWriter, theme: Theme): void {
  const start = typeof list.start === 'number' ? list.start : 1;
  list.items.forEach((item, index) => {
    let marker = list.ordered ? `${start + index}. ` : BULLET;
    if (item.task) {
      marker += item.checked ? '[✓] ' : '[ ] ';
    }
    const inner = new LineWriter();
    renderBlocks(item.tokens, inner, theme, false);
    inner.flush();
    const continuation = ' '.repeat(marker.length);
    inner.lines.forEach((line, lineIndex) => {
      const prefix = lineIndex === 0 ? marker : continuation;
      writer.lines.push([{ text: prefix, style: { color: theme.metadata } }, ...line]);
    });
    if (inner.lines.length === 0) {
      writer.lines.push([{ text: marker, style: { color: theme.metadata } }]);
    }
  });
}

function renderTable(table: Tokens.Table, writer: LineWriter, theme: Theme): void {
  const header = table.header.map((cell) => cell.text).join(' │ ');
  writer.write(header, { color: theme.text, bold: true });
  writer.endLine();
  for (const row of table.rows) {
    writer.write(row.map((cell) => cell.text).join(' │ '), { color: theme.text });
    writer.endLine();
  }
}
