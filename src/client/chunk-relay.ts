import { DEFAULT_CHUNK_BYTES } from '../core/pcm.js'

/** WebSocket.OPEN, without depending on a global WebSocket */
const SOCKET_OPEN = 1

/**
 * The subset of a browser WebSocket the relay needs
 */
export interface BinarySink {
  readonly readyState: number
  readonly bufferedAmount: number
  send(data: ArrayBuffer): void
}

export interface ChunkRelayConfig {
  /** Drop chunks while more than this many bytes are queued on the socket (default: 4 chunks) */
  maxBufferedBytes?: number
}

/**
 * Non-blocking, bounded channel from encoder chunks to the network
 * A chunk is either sent right away or dropped; nothing queues here
 */
export class ChunkRelay {
  private sink: BinarySink | null
  private config: Required<ChunkRelayConfig>
  private sentChunks = 0
  private droppedChunks = 0

  constructor(sink: BinarySink | null, config: ChunkRelayConfig = {}) {
    this.sink = sink
    this.config = {
      maxBufferedBytes: 4 * DEFAULT_CHUNK_BYTES,
      ...config
    }
  }

  /**
   * Point the relay at another socket (or none)
   */
  attach(sink: BinarySink | null): void {
    this.sink = sink
  }

  /**
   * Send one chunk as a binary frame
   * @returns false if the chunk was dropped
   */
  push(chunk: ArrayBuffer): boolean {
    const sink = this.sink
    if (!sink || sink.readyState !== SOCKET_OPEN || sink.bufferedAmount > this.config.maxBufferedBytes) {
      this.droppedChunks++
      return false
    }

    try {
      sink.send(chunk)
    } catch (error) {
      console.error('Error sending audio chunk:', error)
      this.droppedChunks++
      return false
    }

    this.sentChunks++
    return true
  }

  getStats(): { sent: number; dropped: number } {
    return { sent: this.sentChunks, dropped: this.droppedChunks }
  }
}
