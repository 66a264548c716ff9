/**
 * Transport contract for Gearman connections.
 *
 * The protocol engine never opens or closes a socket itself: it writes
 * encoded frames to a {@link ByteChannel}, and the transport feeds inbound
 * bytes and closure back through `GearmanConnection.onDataReceived` and
 * `GearmanConnection.onConnectionLost`.
 */

/** The outbound half of a duplex byte stream. */
export interface ByteChannel {
  /** Write bytes to the peer. Fire-and-forget. */
  write(bytes: Buffer): void;

  /** Tear the stream down. The transport reports the loss afterwards. */
  close(): void;
}
