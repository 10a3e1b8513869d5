/** Wire protocol identifier exchanged in HELLO */
export const PROTOCOL_VERSION = "RemoteHaptics:0.1";

/** Default TCP port for the command channel */
export const NET_DEFAULT_PORT = 7837;

/** Timing defaults shared by server and receiver */
export const TIMING = {
  /** Receiver must say HELLO within this window after connecting */
  HANDSHAKE_TIMEOUT_MS: 5000,
  /** Per-command acknowledgment window */
  ACK_TIMEOUT_MS: 1000,
  /** Receiver clock-sync ping interval */
  TIME_PING_MS: 2000,
  /** How far behind the playhead an impulse may be and still fire */
  LATE_TOLERANCE_SEC: 0.15,
  /** Default actuation length for one impulse */
  PULSE_DURATION_MS: 120,
} as const;
