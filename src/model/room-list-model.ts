import * as Either from "effect/Either";
import * as Option from "effect/Option";
import type { Connection } from "../connection/connection.ts";
import { ConnectionRegistry } from "../connection/registry.ts";
import {
  DuplicateRoomError,
  IntegrityError,
  InvalidPositionError,
  ReentrantUpdateError,
  type RoomListError,
} from "../errors.ts";
import { tagRoomOrder, type RoomOrder } from "../order/room-order.ts";
import { isSystemCaption } from "../order/tags-order.ts";
import type { Room, RoomAspect } from "../room.ts";
import { log, logError, logWarning } from "../util/log.ts";
import type { RoomListChange, RoomListListener } from "./changes.ts";
import { groupLabel, roomRow, type RoomRow } from "./labels.ts";
import {
  RoomGroups,
  type RoomGroup,
  type RoomPosition,
} from "./room-groups.ts";

export interface RoomListModelOptions {
  /**
   * Ordering policy. Defaults to tag grouping with the default tag order.
   */
  readonly order?: RoomOrder;

  /**
   * Throw on integrity and misuse errors after logging them, instead of
   * skipping the offending operation.
   */
  readonly strict?: boolean;
}

/**
 * Positions a room occupied right before its tags changed.
 */
interface PendingTagUpdate {
  readonly room: Room;
  readonly positions: ReadonlyArray<RoomPosition>;
}

const NoAspects: ReadonlySet<RoomAspect> = new Set();

/**
 * Live room list over any number of connections.
 *
 * Listens to connection and room events, keeps a {@link RoomGroups} index in
 * sync and tells listeners about every structural change as a
 * {@link RoomListChange}. All handlers run synchronously inside the event
 * that triggered them.
 *
 * @example
 * ```typescript
 * const model = new RoomListModel();
 * model.subscribe((change) => console.log(change.type));
 * model.addConnection(connection); // "reset"
 * room.addTag("u.work"); // "group-inserted", "room-inserted", ...
 * ```
 */
export class RoomListModel {
  private readonly registry = new ConnectionRegistry();
  private readonly index: RoomGroups;
  private readonly strict: boolean;
  private readonly listeners = new Set<RoomListListener>();
  private readonly roomSubscriptions = new Map<Room, () => void>();
  private readonly connectionSubscriptions = new Map<Connection, () => void>();
  private pending: PendingTagUpdate | undefined;

  constructor(options: RoomListModelOptions = {}) {
    this.index = new RoomGroups(options.order ?? tagRoomOrder());
    this.strict = options.strict ?? false;
  }

  // ===========================================================================
  // Observers
  // ===========================================================================

  subscribe(listener: RoomListListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(change: RoomListChange): void {
    for (const listener of [...this.listeners]) {
      listener(change);
    }
  }

  private report(error: RoomListError): void {
    logError("RoomListModel", error.message, error);
    if (this.strict) {
      throw error;
    }
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  get order(): RoomOrder {
    return this.index.roomOrder;
  }

  get connections(): ReadonlyArray<Connection> {
    return this.registry.connections;
  }

  get groupCount(): number {
    return this.index.size;
  }

  roomCount(group: number): number {
    return this.index.roomCount(group);
  }

  captionAt(group: number): string | undefined {
    return this.index.captionAt(group);
  }

  groupLabelAt(group: number): string | undefined {
    const caption = this.index.captionAt(group);
    return caption === undefined ? undefined : groupLabel(caption);
  }

  roomAt(position: RoomPosition): Room | undefined {
    return this.index.roomAt(position);
  }

  roomRowAt(position: RoomPosition): RoomRow | undefined {
    const room = this.index.roomAt(position);
    return room && roomRow(room, this.registry.connections);
  }

  locateGroup(caption: string): Option.Option<number> {
    return this.index.locateGroup(caption);
  }

  locate(caption: string, room: Room): Option.Option<RoomPosition> {
    return this.index.locate(caption, room);
  }

  /**
   * Rooms across all attached connections, whether listed or not.
   */
  totalRooms(): number {
    return this.registry.totalRooms();
  }

  snapshot(): ReadonlyArray<RoomGroup> {
    return this.index.snapshot();
  }

  // ===========================================================================
  // Connections
  // ===========================================================================

  addConnection(connection: Connection): void {
    if (!this.registry.add(connection)) {
      logWarning("RoomListModel", "Connection is already attached", {
        connection: connection.id,
      });
      return;
    }
    this.connectionSubscriptions.set(
      connection,
      this.connectConnectionSignals(connection),
    );
    for (const room of connection.rooms()) {
      this.connectRoomSignals(room);
    }
    this.index.rebuild(this.registry.rooms());
    this.emit({ type: "reset" });
  }

  removeConnection(connection: Connection): void {
    if (!this.registry.has(connection)) {
      this.report(
        new IntegrityError({
          message: `Connection ${connection.id} is missing in the room list`,
        }),
      );
      return;
    }
    this.index.removeRoomsWhere((room) => room.connection === connection);
    for (const [room, unsubscribe] of this.roomSubscriptions) {
      if (room.connection === connection) {
        unsubscribe();
        this.roomSubscriptions.delete(room);
      }
    }
    this.connectionSubscriptions.get(connection)?.();
    this.connectionSubscriptions.delete(connection);
    if (this.pending?.room.connection === connection) {
      this.pending = undefined;
    }
    this.registry.remove(connection);
    this.emit({ type: "reset" });
  }

  private connectConnectionSignals(connection: Connection): () => void {
    const subscriptions = [
      connection.on("roomAdded", (room) => this.replaceRoom(room)),
      connection.on("roomReplaced", (room, prev) =>
        this.replaceRoom(room, prev),
      ),
      connection.on("roomRemoved", (room) => this.deleteRoom(room)),
      connection.on("disconnected", () => this.removeConnection(connection)),
    ];
    return () => subscriptions.forEach((unsubscribe) => unsubscribe());
  }

  private connectRoomSignals(room: Room): void {
    if (this.roomSubscriptions.has(room)) return;
    const subscriptions = [
      room.on("tagsAboutToChange", () => this.prepareToUpdateGroups(room)),
      room.on("tagsChanged", () => this.updateGroups(room)),
      room.on("displayAttributeChanged", (aspects) =>
        this.refresh(room, aspects),
      ),
    ];
    this.roomSubscriptions.set(room, () =>
      subscriptions.forEach((unsubscribe) => unsubscribe()),
    );
  }

  private disconnectRoomSignals(room: Room): void {
    this.roomSubscriptions.get(room)?.();
    this.roomSubscriptions.delete(room);
  }

  /**
   * Subscribe to every attached room and drop subscriptions of rooms the
   * connections no longer list.
   */
  private syncRoomSignals(): void {
    const present = new Set(this.registry.rooms());
    for (const room of [...this.roomSubscriptions.keys()]) {
      if (!present.has(room)) {
        this.disconnectRoomSignals(room);
      }
    }
    for (const room of present) {
      this.connectRoomSignals(room);
    }
  }

  private rebuild(order?: RoomOrder): void {
    this.pending = undefined;
    this.index.rebuild(this.registry.rooms(), order);
    this.syncRoomSignals();
    this.emit({ type: "reset" });
  }

  /**
   * Switch to another ordering policy. The list is rebuilt from scratch.
   */
  setOrder(order: RoomOrder): void {
    this.rebuild(order);
  }

  // ===========================================================================
  // Room lifecycle
  // ===========================================================================

  /**
   * A room was added, or replaced a previous incarnation of itself (accepted
   * invite, re-joined room). Anything about it may have changed, so the list
   * is rebuilt.
   */
  replaceRoom(room: Room, prev?: Room): void {
    if (prev === room) {
      logError(
        "RoomListModel",
        "Room tried to replace itself",
        new IntegrityError({
          message: `Room ${room.id} tried to replace itself`,
          roomId: room.id,
        }),
      );
      this.refresh(room);
      return;
    }
    if (prev && prev.id !== room.id) {
      // Still doable, just suspicious
      logError(
        "RoomListModel",
        "Room replaced by a different room",
        new IntegrityError({
          message: `Attempt to update room ${prev.id} to ${room.id}`,
          roomId: room.id,
        }),
      );
    }
    // TODO: update the affected groups incrementally instead of resetting
    this.connectRoomSignals(room);
    this.rebuild();
  }

  deleteRoom(room: Room): void {
    if (!this.roomSubscriptions.has(room)) {
      log("RoomListModel", "Ignoring removal of an unlisted room", {
        room: room.id,
      });
      return;
    }
    this.visitRoom(room, (position) => this.doRemoveRoom(position));
    this.disconnectRoomSignals(room);
  }

  /**
   * Tell listeners that the room's rows need redrawing.
   */
  refresh(room: Room, aspects: ReadonlySet<RoomAspect> = NoAspects): void {
    this.visitRoom(room, (position) =>
      this.emit({ type: "data-changed", ...position, aspects }),
    );
  }

  /**
   * Call `visitor` with every position the room should occupy. Positions are
   * looked up one group at a time, so the visitor may change the index.
   */
  private visitRoom(room: Room, visitor: (position: RoomPosition) => void) {
    for (const caption of this.order.groups(room)) {
      const position = this.index.locate(caption, room);
      if (Option.isSome(position)) {
        visitor(position.value);
        continue;
      }
      this.report(
        new IntegrityError({
          message: Option.isNone(this.index.locateGroup(caption))
            ? `Group ${caption} of room ${room.id} is missing in the room list`
            : `The current order lists room ${room.id} in group ${caption} but the model doesn't have it`,
          roomId: room.id,
          caption,
        }),
      );
    }
  }

  private doRemoveRoom(position: RoomPosition): void {
    const removed = this.index.removeRoom(position);
    if (Either.isLeft(removed)) {
      this.report(removed.left);
      return;
    }
    const { room, caption, groupRemoved } = removed.right;
    log("RoomListModel", `Removed room ${room.id} from group ${caption}`);
    this.emit({ type: "room-removed", ...position });
    if (groupRemoved) {
      this.emit({ type: "group-removed", group: position.group });
    }
  }

  private insertRoomToGroups(captions: readonly string[], room: Room): void {
    for (const caption of captions) {
      const group = this.index.insertGroupIfAbsent(caption);
      if (group.created) {
        this.emit({ type: "group-inserted", group: group.position });
      }
      const result = this.index.insertRoom(caption, room);
      switch (result._tag) {
        case "Inserted":
          log("RoomListModel", `Added room ${room.id} to group ${caption}`);
          this.emit({ type: "room-inserted", ...result.position });
          break;
        case "AlreadyPresent":
          logError(
            "RoomListModel",
            "Duplicate insertion skipped",
            new DuplicateRoomError({
              message: `${room.id} is already listed under group ${caption}`,
              roomId: room.id,
              caption,
            }),
          );
          break;
        case "MissingGroup":
          this.report(
            new IntegrityError({
              message: `Group ${caption} vanished while adding room ${room.id}`,
              roomId: room.id,
              caption,
            }),
          );
          break;
      }
    }
  }

  // ===========================================================================
  // Tag updates (two-phase)
  // ===========================================================================

  /**
   * Remember where the room is listed before its tags change.
   */
  prepareToUpdateGroups(room: Room): void {
    if (this.pending) {
      this.report(
        new ReentrantUpdateError({
          message: `Tags of ${room.id} started changing while ${this.pending.room.id} is being updated`,
          roomId: room.id,
          pendingRoomId: this.pending.room.id,
        }),
      );
      return;
    }
    const positions: RoomPosition[] = [];
    this.visitRoom(room, (position) => positions.push(position));
    this.pending = { room, positions };
  }

  /**
   * Apply the room's new tags: re-sort it where it stays, remove it where it
   * no longer belongs and add it to the groups it just joined.
   */
  updateGroups(room: Room): void {
    const pending = this.pending;
    this.pending = undefined;
    if (!pending || pending.room !== room) {
      this.report(
        new IntegrityError({
          message: `Tags of ${room.id} changed without a matching prepare`,
          roomId: room.id,
        }),
      );
      this.rebuild();
      return;
    }

    const captions = this.order.groups(room);
    // Last group first: dropping an emptied group only shifts the groups
    // after it, which have been handled already.
    const positions = [...pending.positions].sort((a, b) => b.group - a.group);
    for (const position of positions) {
      const caption = this.index.captionAt(position.group);
      if (caption === undefined || this.index.roomAt(position) !== room) {
        this.report(
          new IntegrityError({
            message: `Room ${room.id} is no longer where it was before its tags changed`,
            roomId: room.id,
            caption,
          }),
        );
        continue;
      }
      const kept = captions.indexOf(caption);
      if (kept === -1) {
        this.doRemoveRoom(position);
        continue;
      }
      captions.splice(kept, 1);
      this.resortRoom(position);
    }
    this.insertRoomToGroups(captions, room);
  }

  private resortRoom(position: RoomPosition): void {
    const moved = Either.flatMap(
      this.index.sortedPositionAfterChange(position),
      (to) =>
        Either.map(
          this.index.moveRoom(position.group, position.room, to),
          (didMove) => (didMove ? Option.some(to) : Option.none<number>()),
        ),
    );
    if (Either.isLeft(moved)) {
      this.report(moved.left);
      return;
    }
    if (Option.isSome(moved.right)) {
      this.emit({
        type: "room-moved",
        group: position.group,
        from: position.room,
        to: moved.right.value,
      });
    }
  }

  // ===========================================================================
  // Tag management
  // ===========================================================================

  /**
   * Remove the tag behind a group from every room on every connection. The
   * group disappears as the rooms report their tag changes.
   */
  deleteTag(group: number): void {
    const caption = this.index.captionAt(group);
    if (caption === undefined) {
      this.report(
        new InvalidPositionError({
          message: `Invalid tag at position ${group}`,
          group,
        }),
      );
      return;
    }
    if (isSystemCaption(caption)) {
      logWarning("RoomListModel", "System groups cannot be deleted", {
        caption,
      });
      return;
    }
    for (const connection of this.registry.connections) {
      for (const room of [...connection.roomsWithTag(caption)]) {
        room.removeTag(caption);
      }
    }
  }
}
