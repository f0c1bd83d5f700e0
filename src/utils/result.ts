export interface AppError<C extends string = string> { code: C; message: string; cause?: unknown }
export type Ok<T> = { ok: true; value: T }
export type Err<E = AppError> = { ok: false; error: E }
export type Result<T, E = AppError> = Ok<T> | Err<E>
export const ok = <T>(v: T): Ok<T> => ({ ok: true, value: v })
export const err = <C extends string>(code: C, message: string, cause?: unknown): Err<AppError<C>> => ({ ok: false, error: { code, message, cause } })
