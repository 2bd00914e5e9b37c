/***
 * Brand - Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol is never present at runtime; it only keeps
 * structurally identical types apart at compile time.
 *
 * EntityID and ComponentID are both plain numbers at runtime, but a
 * ComponentID can never be passed where an EntityID is expected.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
