import type { Block, LayoutDocument } from './types';

// ============================================================================
// Markdown
// ============================================================================

function renderBlockMarkdown(block: Block): string {
  const page = block.pageRange[0] + 1;

  switch (block.type) {
    case 'title':
      return `# ${block.text}`;
    case 'subtitle':
      return `## ${block.text}`;
    case 'list-element':
      return block.text.split('\n').map(line => `- ${line}`).join('\n');
    case 'image':
      return `![image](page ${page})`;
    case 'table':
      return `[table](page ${page})`;
    default:
      return block.text;
  }
}

/**
 * Render the document as markdown, one paragraph per block.
 * Tables and images become placeholders naming their page (1-based).
 */
export function renderMarkdown(doc: LayoutDocument): string {
  return doc.content.map(renderBlockMarkdown).join('\n\n');
}

// ============================================================================
// Plain text listing
// ============================================================================

/**
 * Format the document for terminal output: one `[page:type] text` line per block
 */
export function formatDocument(doc: LayoutDocument, options?: {
  maxTextLength?: number;
  showSummary?: boolean;
}): string {
  const { maxTextLength = 80, showSummary = true } = options ?? {};
  const lines: string[] = [];

  if (showSummary) {
    lines.push(`Origin: ${doc.detectionOrigin}`);
    lines.push(`Pages: ${doc.metadata.totalPages}, blocks: ${doc.metadata.totalBlocks}`);
    lines.push('');
  }

  for (const block of doc.content) {
    const textOneLine = block.text.replace(/\n/g, ' ');
    const text = textOneLine.length > maxTextLength
      ? textOneLine.substring(0, maxTextLength) + '...'
      : textOneLine;

    lines.push(`[${block.pageRange[0] + 1}:${block.type}] ${text}`.trimEnd());
  }

  return lines.join('\n');
}
