/**
 * Conversation context — a bounded in-memory window of recent messages
 * per group. Oldest messages fall off once a group reaches the limit.
 */

export interface ContextMessage {
  senderId: string;
  text: string;
  timestampMs: number;
}

export interface GroupContext {
  /** Record an observed message. */
  record(groupId: string, message: ContextMessage): void;
  /** Most recent messages, oldest first. */
  recent(groupId: string, limit?: number): ContextMessage[];
  size(groupId: string): number;
  clear(groupId?: string): void;
}

export function createGroupContext(maxMessages: number): GroupContext {
  const windows = new Map<string, ContextMessage[]>();

  return {
    record(groupId, message) {
      const window = windows.get(groupId) ?? [];
      window.push(message);
      if (window.length > maxMessages) {
        window.splice(0, window.length - maxMessages);
      }
      windows.set(groupId, window);
    },

    recent(groupId, limit) {
      const window = windows.get(groupId) ?? [];
      return limit === undefined ? [...window] : window.slice(-limit);
    },

    size: (groupId) => windows.get(groupId)?.length ?? 0,

    clear(groupId) {
      if (groupId === undefined) windows.clear();
      else windows.delete(groupId);
    },
  };
}
