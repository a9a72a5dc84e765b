// utilities from https://github.com/type-challenges/type-challenges
export type Equal<X, Y> = (<T>() => T extends X ? 1 : 2) extends <T>() => T extends Y ? 1 : 2
  ? true
  : false
export type NotEqual<X, Y> = true extends Equal<X, Y> ? false : true

export type Expect<T extends true> = T

/**
 * The argument tuple accepted by a function type.
 */
export type ArgsOf<F> = F extends (...args: infer Args) => unknown ? Args : never
