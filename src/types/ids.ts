declare const userIdBrand: unique symbol;
declare const groupIdBrand: unique symbol;

/** Stable sender identity within a channel, e.g. `tg:42`. */
export type UserId = string & { readonly [userIdBrand]: true };
/** Stable group-chat identity within a channel, e.g. `tg:-100123`. */
export type GroupId = string & { readonly [groupIdBrand]: true };

export const asUserId = (value: string): UserId => value as UserId;
export const asGroupId = (value: string): GroupId => value as GroupId;
