import { parse, HTMLElement, TextNode, type Node } from 'node-html-parser';

export function parseDocument(html: string): HTMLElement {
  return parse(html);
}

// Trimmed <td> texts for every <tr> that has at least one cell
export function tableRows(root: HTMLElement): string[][] {
  return root
    .querySelectorAll('tr')
    .map((tr) => tr.querySelectorAll('td').map((td) => td.text.trim()))
    .filter((cells) => cells.length > 0);
}

function collectText(node: Node, out: string[]): void {
  if (node instanceof TextNode) {
    out.push(node.text);
    return;
  }
  node.childNodes.forEach((child) => collectText(child, out));
}

/**
 * Every text node of the document joined by newlines, so tab-separated
 * blobs inside <pre> or <script> keep their line structure.
 */
export function flattenText(root: HTMLElement): string {
  const parts: string[] = [];
  collectText(root, parts);
  return parts.join('\n');
}
