import { z } from 'zod';
import { FieldElementSchema, UintSchema } from '@semdrop/core';

export const GroupRootsSnapshotSchema = z.array(
  z.object({
    groupId: z.string(),
    roots: z.array(z.string()),
  })
);

export type GroupRootsSnapshot = z.infer<typeof GroupRootsSnapshotSchema>;

/**
 * Merkle root history per membership group. A proof is only checked
 * against roots the group has actually had.
 */
export class GroupRoots {
  private groups: Map<bigint, Set<bigint>> = new Map();

  addRoot(groupId: bigint, root: bigint): void {
    const roots = this.groups.get(groupId) ?? new Set<bigint>();
    roots.add(root);
    this.groups.set(groupId, roots);
  }

  hasRoot(groupId: bigint, root: bigint): boolean {
    return this.groups.get(groupId)?.has(root) ?? false;
  }

  roots(groupId: bigint): bigint[] {
    return Array.from(this.groups.get(groupId) ?? []);
  }

  snapshot(): GroupRootsSnapshot {
    return Array.from(this.groups.entries()).map(([groupId, roots]) => ({
      groupId: groupId.toString(),
      roots: Array.from(roots, (root) => root.toString()),
    }));
  }

  static from(snapshot: GroupRootsSnapshot): GroupRoots {
    const groups = new GroupRoots();
    for (const entry of GroupRootsSnapshotSchema.parse(snapshot)) {
      const groupId = UintSchema.parse(entry.groupId);
      for (const root of entry.roots) {
        groups.addRoot(groupId, FieldElementSchema.parse(root));
      }
    }
    return groups;
  }
}
