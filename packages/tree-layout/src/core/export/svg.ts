import type { RenderModel } from "../render-model";
import type { Point, RelationshipKind } from "../data/types";

export interface SvgOptions {
  padding?: number;
  /** Show person names on the node boxes */
  showLabels?: boolean;
}

const EDGE_STYLES: Record<RelationshipKind, string> = {
  parent: 'stroke="#333"',
  spouse: 'stroke="#666" stroke-dasharray="4,2"',
  sibling: 'stroke="#999" stroke-dasharray="1,3"',
};

/**
 * Static SVG of a render model, edges under nodes, both in render order.
 * Output is deterministic for a given model.
 */
export function renderSvg(model: RenderModel, options: SvgOptions = {}): string {
  const padding = options.padding ?? 20;
  const showLabels = options.showLabels ?? true;

  const { bounds } = model;
  const width = bounds.maxX - bounds.minX + padding * 2;
  const height = bounds.maxY - bounds.minY + padding * 2;
  const offsetX = -bounds.minX + padding;
  const offsetY = -bounds.minY + padding;

  const lines: string[] = [];
  lines.push(`<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`);
  lines.push("  <defs>");
  lines.push(
    '    <marker id="arrow" viewBox="0 0 10 10" refX="10" refY="5" markerWidth="6" markerHeight="6" orient="auto-start-reverse">',
  );
  lines.push('      <path d="M 0 0 L 10 5 L 0 10 z" fill="#333"/>');
  lines.push("    </marker>");
  lines.push("  </defs>");
  lines.push(`  <g transform="translate(${offsetX}, ${offsetY})">`);

  lines.push("    <!-- Edges -->");
  for (const edge of model.edges) {
    const marker = edge.arrow ? ' marker-end="url(#arrow)"' : "";
    lines.push(
      `    <polyline data-id="${escapeXml(edge.id)}" points="${formatPoints(edge.points)}" fill="none" ${EDGE_STYLES[edge.kind]}${marker}/>`,
    );
  }

  lines.push("    <!-- Nodes -->");
  for (const node of model.nodes) {
    const { minX, minY } = node.bounds;
    lines.push(
      `    <rect data-id="${escapeXml(node.id)}" x="${minX}" y="${minY}" width="${node.width}" height="${node.height}" rx="6" fill="#f5f5f5" stroke="#999"/>`,
    );
    if (showLabels) {
      lines.push(
        `    <text x="${node.x}" y="${node.y + 4}" text-anchor="middle" font-size="12">${escapeXml(node.person.name)}</text>`,
      );
    }
  }

  lines.push("  </g>");
  lines.push("</svg>");

  return lines.join("\n");
}

function formatPoints(points: Point[]): string {
  return points.map((p) => `${p.x},${p.y}`).join(" ");
}

function escapeXml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
