/**
 * エディターの状態管理用の型定義
 */

import type { ConnectionPair } from '../domain/entities/NodeGraph';
import type { PortAddress } from '../domain/value-objects/Id';

// Connection drag gesture
export type ConnectionDragState =
  | { status: 'idle' }
  | { status: 'dragging'; origin: PortAddress };

export type DragRejectReason =
  | 'not-dragging'
  | 'no-target'
  | 'same-node'
  | 'same-direction'
  | 'incompatible-types'
  | 'no-available-hook'
  | 'rejected';

export type DragOutcome =
  | { status: 'connected'; connection: ConnectionPair; replaced: ConnectionPair[] }
  | { status: 'rejected'; reason: DragRejectReason; message: string };

