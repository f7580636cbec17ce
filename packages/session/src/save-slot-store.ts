import { SlotNotFoundError } from "@lantern/schemas";

/**
 * Named engine snapshots, held in memory for the life of the process.
 * Saving to an existing name replaces the earlier snapshot.
 */
export class SaveSlotStore<TSnapshot> {
  private slots = new Map<string, { snapshot: TSnapshot }>();

  put(name: string, snapshot: TSnapshot): void {
    this.slots.set(name, { snapshot });
  }

  has(name: string): boolean {
    return this.slots.has(name);
  }

  require(name: string): TSnapshot {
    const slot = this.slots.get(name);
    if (!slot) throw new SlotNotFoundError(name);
    return slot.snapshot;
  }

  names(): string[] {
    return [...this.slots.keys()].sort();
  }
}
