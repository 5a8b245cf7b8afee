import fs from "fs";
import path from "path";
import { z } from "zod";
import { CodedError, ErrorCode } from "../../errors";
import { AccessLogStore, AccessRecord } from "./AccessLogStore";

const AccessLogFileSchema = z.array( z.tuple( [
	z.string(),
	z.object( {
		// Epoch seconds within the range of a Date.
		lastAccessTimestamp: z.number().int().nonnegative().max( 8.64e12 ),
		recentCities: z.array( z.string() )
	} )
] ) );

/**
 * Access log kept in memory. If a persistence file is given, the log is loaded from it on startup and written back
 * after every recorded access.
 */
export default class LocalAccessLogStore implements AccessLogStore {
	private readonly entries: Map< string, AccessRecord >;
	private readonly persistencePath: string | undefined;
	private writeQueue: Promise< void > = Promise.resolve();

	public constructor( persistencePath?: string ) {
		this.persistencePath = persistencePath;
		this.entries = persistencePath ? LocalAccessLogStore.load( persistencePath ) : new Map();
	}

	private static load( filePath: string ): Map< string, AccessRecord > {
		if ( !fs.existsSync( filePath ) ) {
			return new Map();
		}

		try {
			const entries = AccessLogFileSchema.parse( JSON.parse( fs.readFileSync( filePath, "utf8" ) ) );
			console.log( `[AccessLog] Loaded ${ entries.length } persisted clients from ${ filePath }` );
			return new Map( entries );
		} catch ( err ) {
			console.error( "[AccessLog] Error reading access log from local storage.", err );
			return new Map();
		}
	}

	public async getLastAccessTimestamp( ip: string ): Promise< number | undefined > {
		return this.entries.get( ip )?.lastAccessTimestamp;
	}

	public async recordAccess( ip: string, timestamp: number, city: string ): Promise< AccessRecord > {
		const persistencePath = this.persistencePath;
		if ( !persistencePath ) {
			return LocalAccessLogStore.copy( this.apply( ip, timestamp, city ) );
		}

		// Accesses are applied and written one at a time, so each one builds on the last committed state.
		const update = this.writeQueue.then( async () => {
			const previous = this.entries.get( ip );
			const record = this.apply( ip, timestamp, city );
			try {
				await LocalAccessLogStore.write( persistencePath, this.entries );
			} catch ( err ) {
				if ( previous ) {
					this.entries.set( ip, previous );
				} else {
					this.entries.delete( ip );
				}
				throw err;
			}
			return record;
		} );
		// A failed access must not block the accesses queued after it; the caller still sees the rejection.
		this.writeQueue = update.then( () => undefined, () => undefined );

		return LocalAccessLogStore.copy( await update );
	}

	private apply( ip: string, timestamp: number, city: string ): AccessRecord {
		const record: AccessRecord = {
			lastAccessTimestamp: timestamp,
			recentCities: [ city, ...( this.entries.get( ip )?.recentCities ?? [] ) ]
		};
		this.entries.set( ip, record );
		return record;
	}

	private static copy( record: AccessRecord ): AccessRecord {
		return { lastAccessTimestamp: record.lastAccessTimestamp, recentCities: [ ...record.recentCities ] };
	}

	private static async write( filePath: string, entries: Map< string, AccessRecord > ): Promise< void > {
		const content = JSON.stringify( Array.from( entries.entries() ) );
		try {
			await fs.promises.mkdir( path.dirname( filePath ), { recursive: true } );
			await fs.promises.writeFile( filePath, content, "utf8" );
		} catch ( err ) {
			throw new CodedError( ErrorCode.AccessLogUnavailable, "Error saving access log to local storage", { cause: err } );
		}
	}
}
