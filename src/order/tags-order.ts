/**
 * Group (tag) ordering.
 *
 * Groups are ranked by their position in a configurable priority list. An
 * entry is either an exact caption ("m.favourite") or a namespace wildcard
 * ("u.*") that matches every caption under that namespace. Captions matching
 * no entry rank after all that do; equal ranks fall back to comparing the
 * captions themselves.
 */

/**
 * Caption of the group holding direct chats.
 */
export const DirectChatCaption = "im.roomlist.direct";

/**
 * Caption of the group holding rooms that end up in no other group.
 */
export const UntaggedCaption = "im.roomlist.none";

/**
 * Captions under this prefix are produced by the room list itself.
 */
export const SystemCaptionPrefix = "im.roomlist.";

export const FavouriteTag = "m.favourite";
export const LowPriorityTag = "m.lowpriority";

export const DefaultTagsOrder: readonly string[] = [
  FavouriteTag,
  "u.*",
  DirectChatCaption,
  UntaggedCaption,
  LowPriorityTag,
];

/**
 * Rank of `caption` in `order`, honouring namespace wildcards.
 *
 * An exact entry wins; otherwise the caption is cut back at each `.` from
 * right to left and `<prefix>.*` is looked up, so "u.work.team" tries
 * "u.work.*" before "u.*". Returns `order.length` when nothing matches.
 *
 * @example
 * ```typescript
 * findIndexWithWildcards(["m.favourite", "u.*"], "u.work") // 1
 * findIndexWithWildcards(["m.favourite", "u.*"], "other") // 2
 * ```
 */
export const findIndexWithWildcards = (
  order: readonly string[],
  caption: string,
): number => {
  if (order.length === 0 || caption.length === 0) {
    return order.length;
  }

  const exact = order.indexOf(caption);
  if (exact !== -1) {
    return exact;
  }

  for (
    let dot = caption.lastIndexOf(".");
    dot !== -1;
    dot = dot > 0 ? caption.lastIndexOf(".", dot - 1) : -1
  ) {
    const wildcard = order.indexOf(`${caption.slice(0, dot + 1)}*`);
    if (wildcard !== -1) {
      return wildcard;
    }
  }
  return order.length;
};

/**
 * Strict "less than" over group captions for the given priority list.
 */
export const groupLessThan =
  (order: readonly string[]) =>
  (left: string, right: string): boolean => {
    const li = findIndexWithWildcards(order, left);
    const ri = findIndexWithWildcards(order, right);
    return li < ri || (li === ri && left < right);
  };

/**
 * Whether the caption is one of the room list's own pseudo-groups.
 */
export const isSystemCaption = (caption: string): boolean =>
  caption.startsWith(SystemCaptionPrefix);
