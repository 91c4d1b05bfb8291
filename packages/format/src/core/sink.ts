/**
 * Anything text can be forwarded to: a Node writable stream, a test double, ...
 */
export interface OutputPort {
	write(chunk: string): unknown
}

/**
 * Destination of one or more format calls.
 * Accumulates text, or forwards it to a port when one is given, and tracks
 * whether the last emitted character was a newline.
 */
export class OutputSink {
	private readonly port: OutputPort | undefined
	private readonly chunks: string[] = []
	private lineStart = true

	constructor(port?: OutputPort) {
		this.port = port
	}

	/** True before any output and after every write that ends in a newline. */
	get atLineStart(): boolean {
		return this.lineStart
	}

	get forwarding(): boolean {
		return this.port !== undefined
	}

	write(text: string): void {
		if (text.length === 0) return
		if (this.port) {
			this.port.write(text)
		} else {
			this.chunks.push(text)
		}
		this.lineStart = text.endsWith('\n')
	}

	/** Emits a newline unless output is already at the start of a line. */
	freshLine(): void {
		if (!this.lineStart) this.write('\n')
	}

	/** Accumulated text; always empty for a forwarding sink. */
	text(): string {
		return this.chunks.join('')
	}
}
