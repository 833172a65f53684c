import { lstatSync } from 'node:fs'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'

const SECRET_MODE = 0o600

/**
 * Assert that a file is safe to read: not a symlink, and not world/group-readable.
 *
 * Guards against symlink-based path traversal and overly permissive file modes
 * on files holding key material.
 */
export function assertSecureFile(targetPath: string): void {
	const statInfo = lstatSync(targetPath)
	if (statInfo.isSymbolicLink()) {
		throw new Error(`Refusing to read symlinked file: ${targetPath}`)
	}
	const mode = statInfo.mode & 0o777
	if ((mode & 0o077) !== 0) {
		throw new Error(
			`File permissions too open: ${targetPath} (${mode.toString(8)})`,
		)
	}
}

/** A secret written to its own private temp directory. */
export interface TransientFile {
	readonly path: string
	/** Remove the file and its directory. Safe to call more than once. */
	dispose(): Promise<void>
}

/**
 * Write `content` to a fresh owner-only file under a new `mkdtemp` directory.
 * The file is created exclusively so an existing path is never reused.
 */
export async function writeTransientFile(
	fileName: string,
	content: string,
	baseDir?: string,
): Promise<TransientFile> {
	const dir = await mkdtemp(path.join(baseDir ?? tmpdir(), 'admanager-'))
	const filePath = path.join(dir, fileName)
	try {
		await writeFile(filePath, content, {
			encoding: 'utf8',
			mode: SECRET_MODE,
			flag: 'wx',
		})
	} catch (err) {
		await rm(dir, { recursive: true, force: true })
		throw err
	}
	return {
		path: filePath,
		dispose: async () => {
			await rm(dir, { recursive: true, force: true })
		},
	}
}
