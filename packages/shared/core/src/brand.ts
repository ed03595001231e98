declare const brandTag: unique symbol;

export type Brand<T, TTag extends string> = T & { readonly [brandTag]: TTag };

export const withBrand = <T, TTag extends string>(value: T, _tag: TTag): Brand<T, TTag> => value as Brand<T, TTag>;
