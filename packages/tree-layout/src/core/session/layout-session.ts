import { computeRenderModel, type RenderModel } from "../render-model";
import { LayoutInvariantViolation, LayoutPassError, type LayoutSessionError } from "../errors";
import {
  DEFAULT_LAYOUT_CONFIG,
  type LayoutConfig,
  type Person,
  type RecordStore,
  type Relationship,
} from "../data/types";

export interface LayoutSessionOptions {
  config?: LayoutConfig;
  /** Called with every published model */
  onModel?: (model: RenderModel) => void;
  /** Called when a pass fails or onModel throws */
  onError?: (error: LayoutSessionError) => void;
}

interface Snapshot {
  persons: Person[];
  relationships: Relationship[];
}

function messageOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Keeps a render model in step with a record store. Each refresh reads a
 * full snapshot and recomputes from scratch; when refreshes overlap only the
 * most recently started one may publish.
 */
export class LayoutSession {
  private model: RenderModel | null = null;
  private latestPass = 0;
  private unsubscribe: (() => void) | null = null;
  private readonly config: LayoutConfig;

  constructor(
    private readonly store: RecordStore,
    private readonly options: LayoutSessionOptions = {},
  ) {
    this.config = options.config ?? DEFAULT_LAYOUT_CONFIG;
  }

  /** Last successfully published model */
  get current(): RenderModel | null {
    return this.model;
  }

  get running(): boolean {
    return this.unsubscribe !== null;
  }

  /**
   * Runs one pass. Resolves to the published model, or to the current model
   * when the pass failed or was superseded. Errors thrown by onModel are
   * reported through onError; only an error thrown by onError rejects.
   */
  async refresh(): Promise<RenderModel | null> {
    const pass = ++this.latestPass;

    let snapshot: Snapshot;
    try {
      snapshot = await this.readSnapshot();
    } catch (cause) {
      return this.fail(pass, new LayoutPassError({ stage: "read", message: messageOf(cause), cause }));
    }

    if (pass !== this.latestPass) return this.model;

    let model: RenderModel;
    try {
      model = computeRenderModel(snapshot.persons, snapshot.relationships, this.config);
    } catch (cause) {
      const error =
        cause instanceof LayoutInvariantViolation
          ? cause
          : new LayoutPassError({ stage: "layout", message: messageOf(cause), cause });
      return this.fail(pass, error);
    }

    this.model = model;
    try {
      this.options.onModel?.(model);
    } catch (cause) {
      this.fail(pass, new LayoutPassError({ stage: "publish", message: messageOf(cause), cause }));
    }
    return model;
  }

  /** Refreshes now and on every change signal from the store */
  start(): Promise<RenderModel | null> {
    if (!this.unsubscribe) {
      this.unsubscribe = this.store.subscribe(() => {
        void this.refresh();
      });
    }
    return this.refresh();
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  private async readSnapshot(): Promise<Snapshot> {
    const [persons, relationships] = await Promise.all([
      this.store.listPersons(),
      this.store.listRelationships(),
    ]);
    return { persons, relationships };
  }

  private fail(pass: number, error: LayoutSessionError): RenderModel | null {
    // A superseded pass has nothing to report
    if (pass === this.latestPass) this.options.onError?.(error);
    return this.model;
  }
}
