import type { ConversationItem } from "./items";

function freezeItem<T extends ConversationItem>(item: T): Readonly<T> {
  if (item.type === "message") {
    for (const part of item.content) Object.freeze(part);
    Object.freeze(item.content);
  }
  return Object.freeze(item);
}

/**
 * Ordered, append-only record of a task's items. Owned by the orchestrator
 * between turns; the client only ever receives snapshots.
 */
export class ConversationHistory {
  private readonly items: ConversationItem[] = [];

  constructor(initial: readonly ConversationItem[] = []) {
    this.append(...initial);
  }

  get length(): number {
    return this.items.length;
  }

  append(...items: ConversationItem[]): void {
    for (const item of items) {
      this.items.push(freezeItem(structuredClone(item)));
    }
  }

  snapshot(): readonly ConversationItem[] {
    return Object.freeze([...this.items]);
  }
}
