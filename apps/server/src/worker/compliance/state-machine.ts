import { PPE_ITEMS, type PpeItem } from "../../shared/types/detector";
import type {
  ComplianceSnapshot,
  ComplianceState,
  ComplianceTransition,
  ItemSnapshot,
  ItemStatus,
} from "../../shared/types/compliance";
import type { ComplianceConfig } from "../config/pipeline-config";
import { ItemWindow } from "./item-window";

export type PresenceLookup = {
  has: (item: PpeItem) => boolean;
};

export type ComplianceStateMachineOptions = {
  config: ComplianceConfig;
  requiredItems?: readonly PpeItem[];
  onTransition?: (event: ComplianceTransition) => void;
};

const dedupeItems = (items: readonly PpeItem[]): PpeItem[] => {
  return PPE_ITEMS.filter((item) => items.includes(item));
};

const resolveState = (statuses: ItemStatus[], allFull: boolean): ComplianceState => {
  if (!allFull) {
    return "initializing";
  }
  if (statuses.some((status) => status === "nonCompliant")) {
    return "nonCompliant";
  }
  if (statuses.every((status) => status === "compliant")) {
    return "compliant";
  }
  return "partial";
};

/**
 * Per-track compliance. Windows are kept for every known item so a change of
 * required items mid-track keeps the history already gathered.
 */
export class ComplianceStateMachine {
  private readonly config: ComplianceConfig;

  private requiredItems: PpeItem[];

  private readonly windows = new Map<PpeItem, ItemWindow>();

  private state: ComplianceState = "initializing";

  private lastUpdatedAt = 0;

  private lastStateChangeAt = 0;

  private readonly onTransition?: (event: ComplianceTransition) => void;

  constructor(options: ComplianceStateMachineOptions) {
    this.config = { ...options.config };
    this.requiredItems = dedupeItems(options.requiredItems ?? options.config.requiredPpe);
    this.onTransition = options.onTransition;
    PPE_ITEMS.forEach((item) => {
      this.windows.set(item, new ItemWindow(this.config.windowSize));
    });
  }

  setRequiredItems(items: readonly PpeItem[], timestamp = this.lastUpdatedAt): ComplianceSnapshot {
    this.requiredItems = dedupeItems(items);
    this.evaluate(timestamp);
    return this.getSnapshot();
  }

  getState(): ComplianceState {
    return this.state;
  }

  /** Records one frame in which the track was seen. */
  observe(present: PresenceLookup, timestamp: number): ComplianceSnapshot {
    this.windows.forEach((window, item) => {
      window.push(present.has(item), timestamp);
    });
    this.evaluate(timestamp);
    return this.getSnapshot();
  }

  itemsWithStatus(status: ItemStatus): PpeItem[] {
    return this.requiredItems.filter(
      (item) => this.itemStatus(item) === status,
    );
  }

  getSnapshot(): ComplianceSnapshot {
    return {
      state: this.state,
      items: this.requiredItems.map((item) => this.itemSnapshot(item)),
      requiredItems: [...this.requiredItems],
      lastUpdatedAt: this.lastUpdatedAt,
      lastStateChangeAt: this.lastStateChangeAt,
    };
  }

  lastDetectedAt(item: PpeItem): number | null {
    return this.windows.get(item)?.getLastDetectedAt() ?? null;
  }

  private itemStatus(item: PpeItem): ItemStatus {
    return this.windows.get(item)?.status(this.config.confirmationRatio) ?? "partial";
  }

  private itemSnapshot(item: PpeItem): ItemSnapshot {
    const window = this.windows.get(item);
    return {
      type: item,
      status: this.itemStatus(item),
      ratio: window?.ratio() ?? null,
      samples: window?.length ?? 0,
      lastDetectedAt: window?.getLastDetectedAt() ?? null,
    };
  }

  private evaluate(timestamp: number): void {
    const statuses = this.requiredItems.map((item) => this.itemStatus(item));
    const allFull = this.requiredItems.every(
      (item) => this.windows.get(item)?.isFull() ?? false,
    );
    const nextState = resolveState(statuses, allFull);
    const previousState = this.state;

    this.state = nextState;
    this.lastUpdatedAt = timestamp;

    if (previousState !== nextState) {
      this.lastStateChangeAt = timestamp;
      this.onTransition?.({
        from: previousState,
        to: nextState,
        timestamp,
        snapshot: this.getSnapshot(),
      });
    }
  }
}
