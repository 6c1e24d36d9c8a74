import { nanoid } from "nanoid";

export const ITEM_ID_PREFIX = "itm_";

export function newItemId(): string {
  return `${ITEM_ID_PREFIX}${nanoid(12)}`;
}
