/**
 * ポートの方向を表す値オブジェクト
 */
export type PortDirection = 'input' | 'output';

/**
 * ポートを描画する側（モデル上の意味はありません）
 */
export type PortSide = 'left' | 'right';

/**
 * 入力ポートの種類
 *
 * - connectionOnly: 接続からのみ値を受け取る
 * - constantOnly: 定数値のみ。接続は受け付けない
 * - connectionOrConstant: 両方を受け付け、接続が優先される
 */
export type InputPortKind = 'connectionOnly' | 'constantOnly' | 'connectionOrConstant';
