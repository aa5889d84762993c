export type Primitive = string | number | boolean | null | undefined;
export type Serializable = { [key: string]: Primitive };
/** Screen side of a video */
export type Side = 'left' | 'right';
/** Level of a trait shown by a video */
export type Level = 'high' | 'low';
export type Response = Side | 'timeout';
