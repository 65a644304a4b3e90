import type { ActivityEntry } from "./types.js";

export interface ActivityLogPort {
  load(username: string): Promise<ActivityEntry[]>;
  save(username: string, entries: ActivityEntry[]): Promise<void>;
  clear(username: string): Promise<void>;
}

export const createInMemoryActivityLogPort = (): ActivityLogPort => {
  const byUser = new Map<string, ActivityEntry[]>();

  return {
    async load(username) {
      return [...(byUser.get(username) ?? [])];
    },
    async save(username, entries) {
      byUser.set(username, [...entries]);
    },
    async clear(username) {
      byUser.delete(username);
    },
  };
};
