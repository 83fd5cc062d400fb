import type { GroupId } from '../types/game';
import { EngineErrorCode, InvalidState } from './errors';
import type { Group } from './Group';

/**
 * Sparse table of live groups keyed by small integer ids.
 *
 * Ids are handed out by {@link GroupTable.allocateId}: the smallest
 * non-negative integer that is not currently a key. A freed id is reused by
 * the next allocation, so ids stay small and allocation is deterministic for
 * a given sequence of inserts and removals.
 */
export class GroupTable {
  private readonly groups = new Map<GroupId, Group>();

  get size(): number {
    return this.groups.size;
  }

  allocateId(): GroupId {
    let id = 0;
    while (this.groups.has(id)) {
      id++;
    }
    return id;
  }

  insert(group: Group): void {
    if (this.groups.has(group.id)) {
      throw new InvalidState(
        EngineErrorCode.STATE_DUPLICATE_GROUP,
        `Group ${group.id} is already in the table`,
        { groupId: group.id },
        'GroupTable'
      );
    }
    this.groups.set(group.id, group);
  }

  remove(id: GroupId): void {
    this.groups.delete(id);
  }

  /**
   * Look up a group that the grid says must exist.
   */
  require(id: GroupId, context: Record<string, unknown> = {}): Group {
    const group = this.groups.get(id);
    if (!group) {
      throw new InvalidState(
        EngineErrorCode.STATE_GROUP_NOT_FOUND,
        `Group ${id} is not in the table`,
        { groupId: id, ...context },
        'GroupTable'
      );
    }
    return group;
  }

  values(): IterableIterator<Group> {
    return this.groups.values();
  }

  clear(): void {
    this.groups.clear();
  }
}
