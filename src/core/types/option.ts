export type Option<A> =
    | { readonly _tag: "None" }
    | { readonly _tag: "Some"; readonly value: A };

export const none: Option<never> = { _tag: "None" };

export const some = <A>(value: A): Option<A> => ({ _tag: "Some", value });

export const isSome = <A>(opt: Option<A>): opt is { readonly _tag: "Some"; readonly value: A } =>
    opt._tag === "Some";
