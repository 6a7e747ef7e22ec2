/**
 * RoomList service
 *
 * Wraps a {@link RoomListModel} for Effect programs: the model is built from
 * {@link RoomListConfig}, and its change notifications are fanned out through
 * a PubSub so any number of consumers can follow them as streams.
 */
import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as PubSub from "effect/PubSub";
import type * as Scope from "effect/Scope";
import * as Stream from "effect/Stream";
import { RoomListConfig } from "./config.ts";
import type { Connection } from "./connection/connection.ts";
import type { RoomListChange } from "./model/changes.ts";
import type { RoomGroup } from "./model/room-groups.ts";
import { RoomListModel } from "./model/room-list-model.ts";
import { tagRoomOrder } from "./order/room-order.ts";

export interface RoomListService {
  /**
   * The underlying model, for synchronous reads between events.
   */
  readonly model: RoomListModel;

  attach(connection: Connection): Effect.Effect<void>;
  detach(connection: Connection): Effect.Effect<void>;

  readonly snapshot: Effect.Effect<ReadonlyArray<RoomGroup>>;

  /**
   * Changes from the moment of subscription on, until the scope closes.
   */
  readonly subscribe: Effect.Effect<
    Stream.Stream<RoomListChange>,
    never,
    Scope.Scope
  >;
}

export class RoomList extends Context.Tag("RoomList")<
  RoomList,
  RoomListService
>() {}

export const RoomListLive = Layer.scoped(
  RoomList,
  Effect.gen(function* () {
    const config = yield* RoomListConfig;
    const model = new RoomListModel({
      order: tagRoomOrder(config.tagsOrder),
      strict: config.strict,
    });
    const pubsub = yield* PubSub.unbounded<RoomListChange>();

    // Publishing to an unbounded PubSub completes synchronously
    const unsubscribe = model.subscribe((change) => {
      Effect.runSync(PubSub.publish(pubsub, change));
    });
    yield* Effect.addFinalizer(() =>
      Effect.sync(unsubscribe).pipe(Effect.zipRight(PubSub.shutdown(pubsub))),
    );

    return {
      model,
      attach: (connection) => Effect.sync(() => model.addConnection(connection)),
      detach: (connection) =>
        Effect.sync(() => model.removeConnection(connection)),
      snapshot: Effect.sync(() => model.snapshot()),
      subscribe: Effect.map(PubSub.subscribe(pubsub), (queue) =>
        Stream.fromQueue(queue),
      ),
    } satisfies RoomListService;
  }),
);
