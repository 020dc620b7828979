import RBush from "rbush";
import type { Bounds, PersonId, RenderNode } from "../data/types";

interface SpatialItem {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  id: PersonId;
  /** Render order; higher is drawn later, i.e. on top */
  order: number;
}

/** R-tree over model-space node bounds */
export class SpatialIndex {
  private tree = new RBush<SpatialItem>();

  load(nodes: readonly RenderNode[]): void {
    this.tree.clear();
    const items = nodes.map((node, order) => ({ ...node.bounds, id: node.id, order }));
    this.tree.load(items);
  }

  queryRect(bounds: Bounds): PersonId[] {
    return this.tree
      .search({
        minX: bounds.minX,
        minY: bounds.minY,
        maxX: bounds.maxX,
        maxY: bounds.maxY,
      })
      .sort((a, b) => a.order - b.order)
      .map((item) => item.id);
  }

  /** Topmost node whose bounds contain the point, boundary included */
  queryPoint(x: number, y: number): PersonId | null {
    const results = this.tree.search({
      minX: x,
      minY: y,
      maxX: x,
      maxY: y,
    });

    let top: SpatialItem | undefined;
    for (const item of results) {
      if (!top || item.order > top.order) top = item;
    }
    return top?.id ?? null;
  }

  get size(): number {
    return this.tree.all().length;
  }

  clear(): void {
    this.tree.clear();
  }
}
