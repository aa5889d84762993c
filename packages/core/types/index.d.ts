export type EventMapLike = { [key: string]: unknown };
/** Uniform source of numbers in `[0, 1)` */
export type Random = () => number;
