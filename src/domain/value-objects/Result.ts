/**
 * 失敗し得る操作の戻り値
 *
 * ドメイン層の操作は例外を投げず、どの識別子が原因かを持つ構造化エラーを返します。
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<const E>(error: E): Result<never, E> {
  return { ok: false, error };
}
