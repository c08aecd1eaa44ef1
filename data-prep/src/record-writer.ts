/**
 * Persist fetched records as one JSON file each.
 *
 * Layout under the output root:
 *   games/<day>/<homeTeam>.json
 *   players/<playerId>/<day>.json
 */

import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import {
	serializeTagged,
	type GameUpdate,
	type PlayerStatsheet,
	type TaggedRecord,
} from '@statsheet-archive/model';
import type { Limiter } from './concurrency.js';
import { FilesystemError } from './errors.js';
import type { Logger, RecordCategory } from './types.js';

export interface RecordWriterOptions {
	outDir: string;
	/** Shared cap on concurrent writes */
	limiter: Limiter;
	logger?: Logger;
}

function isUnsafeSegment(segment: string): boolean {
	return segment === '' || segment === '.' || segment === '..' || /[\\/\0]/.test(segment);
}

export class RecordWriter {
	private readonly outDir: string;
	private readonly limiter: Limiter;
	private readonly logger: Logger;

	constructor(options: RecordWriterOptions) {
		this.outDir = options.outDir;
		this.limiter = options.limiter;
		this.logger = options.logger ?? console;
	}

	/**
	 * Path for a record: `<outDir>/<category>/<...segments>.json`.
	 * Segments come from remote ids, so anything that could leave the
	 * category directory is refused.
	 */
	resolvePath(category: RecordCategory, segments: readonly string[]): string {
		const parts = [category, ...segments];
		const unsafe = segments.length === 0 ? '' : segments.find(isUnsafeSegment);
		if (unsafe !== undefined) {
			throw new FilesystemError(path.join(this.outDir, ...parts), `Refusing unsafe path segment ${JSON.stringify(unsafe)}`);
		}
		const fileName = `${parts[parts.length - 1]}.json`;
		return path.join(this.outDir, ...parts.slice(0, -1), fileName);
	}

	/**
	 * Write `record` to its path, creating parent directories and replacing
	 * any existing file. Resolves with the path written.
	 */
	async write<T extends object>(
		category: RecordCategory,
		segments: readonly string[],
		record: TaggedRecord<T>
	): Promise<string> {
		const filePath = this.resolvePath(category, segments);
		const contents = serializeTagged(record);

		return this.limiter.run(async () => {
			this.logger.log(`[RecordWriter] writing ${filePath}`);
			try {
				await mkdir(path.dirname(filePath), { recursive: true });
				await writeFile(filePath, contents, 'utf8');
			} catch (error) {
				throw new FilesystemError(filePath, 'Failed to write record', { cause: error });
			}
			this.logger.log(`[RecordWriter] written ${filePath}`);
			return filePath;
		});
	}

	writeGame(day: number, game: GameUpdate): Promise<string> {
		return this.write('games', [String(day), game.fields.homeTeam], game);
	}

	writePlayer(day: number, player: PlayerStatsheet): Promise<string> {
		return this.write('players', [player.fields.playerId, String(day)], player);
	}
}
