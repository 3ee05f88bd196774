export type HomeAssistantEvent = {
  eventType: string;
  data: Record<string, unknown>;
};

export type HomeAssistantEventCallback = (event: HomeAssistantEvent) => void;

/**
 * Request/response and event channel to Home Assistant's WebSocket API.
 */
export interface HomeAssistantConnection {
  connect(): Promise<void>;
  close(): void;
  sendCommand(type: string, payload?: Record<string, unknown>): Promise<unknown>;
  /**
   * Registers interest in an event type. Active while authenticated and
   * renewed after every reconnect until the returned function runs.
   */
  subscribeEvents(eventType: string, callback: HomeAssistantEventCallback): Promise<() => void>;
  /** Runs after every successful authentication, including reconnects. */
  onConnected(callback: () => void): () => void;
}

/** Home Assistant rejected the access token; the client stops reconnecting. */
export class HomeAssistantAuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HomeAssistantAuthError';
  }
}
