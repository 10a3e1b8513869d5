/**
 * In-memory session store.
 * One session per connected receiver, opened in "handshaking" when the TLS
 * connection is accepted and activated by HELLO; nothing survives a disconnect.
 */

import type {
  CommandId,
  DeviceInfo,
  DeviceTarget,
  ReceiverId,
  SessionId,
  SessionState,
} from "@remote-haptics/shared";
import type { SessionLink } from "./link.js";

/** Generate a unique session ID */
function generateSessionId(): SessionId {
  return `ses-${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

export interface Session {
  sessionId: SessionId;
  /** Known once the receiver said HELLO */
  receiverId: ReceiverId | null;
  link: SessionLink;
  state: SessionState;
  /** SHA-256 fingerprint of the client certificate, when one was presented */
  fingerprint: string | null;
  /** Devices announced in HELLO, kept current by DEVICE_STATUS */
  devices: Map<DeviceTarget, DeviceInfo>;
  lastAckedCommandId: CommandId | null;
  latencyMs: number;
  connectedAt: number;
}

/** Summary for the health endpoint and logs */
export interface SessionSummary {
  sessionId: SessionId;
  receiverId: ReceiverId | null;
  address: string;
  state: SessionState;
  fingerprint: string | null;
  devices: DeviceInfo[];
  lastAckedCommandId: CommandId | null;
  latencyMs: number;
}

export class SessionStore {
  /** Map of sessionId -> Session */
  private sessions: Map<SessionId, Session> = new Map();

  /** Map of link id -> sessionId for reverse lookup */
  private linkIndex: Map<string, SessionId> = new Map();

  /** Track a freshly connected link; it carries no traffic until activated */
  openSession(link: SessionLink, fingerprint: string | null): Session {
    this.removeByLink(link.id);

    const session: Session = {
      sessionId: generateSessionId(),
      receiverId: null,
      link,
      state: "handshaking",
      fingerprint,
      devices: new Map(),
      lastAckedCommandId: null,
      latencyMs: 0,
      connectedAt: Date.now(),
    };

    this.sessions.set(session.sessionId, session);
    this.linkIndex.set(link.id, session.sessionId);
    return session;
  }

  /** Complete the handshake for a link's session */
  activate(linkId: string, receiverId: ReceiverId, devices: DeviceInfo[]): Session | undefined {
    const session = this.getByLink(linkId);
    if (!session) return undefined;
    session.receiverId = receiverId;
    session.devices = new Map(devices.map((device) => [device.id, { ...device }]));
    session.state = "active";
    return session;
  }

  getSession(sessionId: SessionId): Session | undefined {
    return this.sessions.get(sessionId);
  }

  getByLink(linkId: string): Session | undefined {
    const sessionId = this.linkIndex.get(linkId);
    return sessionId ? this.sessions.get(sessionId) : undefined;
  }

  has(sessionId: SessionId): boolean {
    return this.sessions.has(sessionId);
  }

  /** Drop the session carried by a link, returning it if there was one */
  removeByLink(linkId: string): Session | undefined {
    const sessionId = this.linkIndex.get(linkId);
    if (!sessionId) return undefined;
    const session = this.sessions.get(sessionId);
    this.sessions.delete(sessionId);
    this.linkIndex.delete(linkId);
    return session;
  }

  /** Active sessions that should receive a command for `target` */
  sessionsFor(target: DeviceTarget, broadcastTarget: DeviceTarget): Session[] {
    const result: Session[] = [];
    for (const session of this.sessions.values()) {
      if (session.state !== "active") continue;
      if (target === broadcastTarget || session.devices.get(target)?.available === true) {
        result.push(session);
      }
    }
    return result;
  }

  setDeviceAvailability(sessionId: SessionId, target: DeviceTarget, available: boolean): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    const device = session.devices.get(target);
    session.devices.set(target, { id: target, name: device?.name ?? target, available });
    return true;
  }

  recordAck(sessionId: SessionId, commandId: CommandId): void {
    const session = this.sessions.get(sessionId);
    if (session) {
      session.lastAckedCommandId = commandId;
    }
  }

  updateLatency(linkId: string, latencyMs: number): void {
    const session = this.getByLink(linkId);
    if (session) {
      session.latencyMs = latencyMs;
    }
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  getActiveCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.state === "active") count++;
    }
    return count;
  }

  summaries(): SessionSummary[] {
    return [...this.sessions.values()].map((session) => ({
      sessionId: session.sessionId,
      receiverId: session.receiverId,
      address: session.link.address,
      state: session.state,
      fingerprint: session.fingerprint,
      devices: [...session.devices.values()],
      lastAckedCommandId: session.lastAckedCommandId,
      latencyMs: session.latencyMs,
    }));
  }

  clear(): void {
    this.sessions.clear();
    this.linkIndex.clear();
  }
}
