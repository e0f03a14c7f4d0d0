import type { SessionInfo } from "../../session/session.types";
import type { OutputEvent, StreamInvokeOptions } from "../../stream/stream.types";

export interface WebErrorDTO {
  readonly errorCode: string;
  readonly guideMessage: string;
  readonly message?: string;
}

export interface ChatStreamRequest {
  readonly sessionId: string;
  readonly message: string;
}

export type WireEvent = OutputEvent & { readonly timestamp: string };

export interface WebSessionResponseDTO {
  readonly session: SessionInfo;
}

export interface WebSessionCloseResultDTO {
  readonly sessionId: string;
  readonly closed: boolean;
}

export interface WebSessionListDTO {
  readonly sessions: readonly SessionInfo[];
}

/** What the HTTP layer needs from the session runtime. */
export interface IChatSessionService {
  readonly sessionCount: number;
  streamChat(
    sessionId: string,
    message: string,
    options?: StreamInvokeOptions
  ): AsyncIterable<OutputEvent>;
  getSessionInfo(sessionId: string): SessionInfo | null;
  closeSession(sessionId: string): Promise<boolean>;
  listSessions(): Promise<readonly SessionInfo[]>;
}
