/** Every WebSocket message follows this envelope shape */
export interface Envelope<T = unknown> {
  type: string;
  id: string;
  timestamp: number;
  payload: T;
}

/** A relayed chat line. `target` is the channel's display name. */
export interface ChatMessage {
  sender: string;
  senderId: number;
  target: string;
  text: string;
}
