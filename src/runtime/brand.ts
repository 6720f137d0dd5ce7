/**
 * Brand helper for "parse, don't validate".
 *
 * A branded value proves it went through a parsing boundary (config schema,
 * environment builder). Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
