import type { ProgressMode } from './output'

/** Progress lines on stderr; overwritten in place when animated. */
export class ProgressDisplay {
	private lastLineLength = 0

	constructor(private readonly mode: ProgressMode) {}

	update(current: number, total: number, message?: string): void {
		if (this.mode === 'off') return
		const base = `Progress ${current}/${total}`
		const line = message ? `${base} - ${message}` : base
		this.writeLine(line, this.mode === 'animated')
	}

	percent(label: string, percent: number): void {
		if (this.mode === 'off') return
		this.writeLine(`${label} ${percent.toFixed(1)}%`, this.mode === 'animated')
	}

	status(message: string): void {
		if (this.mode === 'off') return
		this.writeLine(message, this.mode === 'animated')
	}

	finish(): void {
		if (this.mode === 'off') return
		if (this.mode === 'animated' && this.lastLineLength > 0) {
			process.stderr.write('\n')
		}
		this.lastLineLength = 0
	}

	private writeLine(line: string, overwrite: boolean): void {
		if (!overwrite) {
			process.stderr.write(`${line}\n`)
			this.lastLineLength = 0
			return
		}
		const padding =
			this.lastLineLength > line.length
				? ' '.repeat(this.lastLineLength - line.length)
				: ''
		process.stderr.write(`\r${line}${padding}`)
		this.lastLineLength = line.length
	}
}
