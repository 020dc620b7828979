export type PersonId = string;

export interface Person {
  id: PersonId;
  name: string;
  firstName?: string;
  middleName?: string;
  lastName?: string;
  maidenName?: string;
  birthDate?: string;
  deathDate?: string;
  burialPlace?: string;
  links?: string;
  notes?: string;
}

export type RelationshipKind = "parent" | "spouse" | "sibling";

/**
 * A typed link between two persons. For `parent`, `sourceId` is the parent and
 * `targetId` the child; `spouse` and `sibling` are unordered.
 */
export interface Relationship {
  id: string;
  kind: RelationshipKind;
  sourceId: PersonId;
  targetId: PersonId;
}

export interface GraphEntry {
  id: PersonId;
  parentIds: PersonId[];
  childIds: PersonId[];
  spouseIds: PersonId[];
  siblingIds: PersonId[];
}

/** Derived adjacency for one layout pass. Rebuilt on every data change. */
export interface FamilyGraph {
  persons: Map<PersonId, Person>;
  entries: Map<PersonId, GraphEntry>;
  /** All person ids, ascending */
  order: PersonId[];
  parentLinks: Relationship[];
  spouseLinks: Relationship[];
  siblingLinks: Relationship[];
}

export type GenerationMap = Map<PersonId, number>;

export interface Point {
  x: number;
  y: number;
}

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface RenderNode {
  id: PersonId;
  person: Person;
  // Center in model coordinates
  x: number;
  y: number;
  width: number;
  height: number;
  bounds: Bounds;
  generation: number;
}

export interface RenderEdge {
  id: string;
  kind: RelationshipKind;
  sourceId: PersonId;
  targetId: PersonId;
  points: Point[];
  /** Arrowhead at the target end (parent -> child only) */
  arrow: boolean;
}

export interface ViewportState {
  dx: number;
  dy: number;
  zoom: number;
}

export interface LayoutConfig {
  nodeWidth: number;
  nodeHeight: number;
  horizontalGap: number;
  spouseGap: number;
  levelHeight: number;
  siblingOffset: number;
  /** Vertical axis every level is centered on */
  originX: number;
  /** Center y of the topmost level */
  originY: number;
}

export interface ViewportConfig {
  minZoom: number;
  maxZoom: number;
  initialZoom: number;
}

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = {
  nodeWidth: 120,
  nodeHeight: 80,
  horizontalGap: 30,
  spouseGap: 20,
  levelHeight: 200,
  siblingOffset: 20,
  originX: 1000,
  originY: 100,
};

export const DEFAULT_VIEWPORT_CONFIG: ViewportConfig = {
  minZoom: 0.1,
  maxZoom: 4,
  initialZoom: 1,
};

/**
 * Boundary with the record store. The layout subsystem only ever reads
 * snapshots and rebuilds when the store signals a change.
 */
export interface RecordStore {
  listPersons(): Promise<Person[]>;
  listRelationships(): Promise<Relationship[]>;
  /** Registers a "data changed" listener; returns the unsubscribe function */
  subscribe(listener: () => void): () => void;
}
