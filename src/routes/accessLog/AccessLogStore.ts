export interface AccessRecord {
	/** Unix epoch seconds of the most recent access. */
	lastAccessTimestamp: number;
	/** Cities requested from this address, most recent first. */
	recentCities: string[];
}

/**
 * Keeps track of which client addresses requested which cities. Implementations reject with a CodedError with the
 * `AccessLogUnavailable` code if the underlying storage fails.
 */
export interface AccessLogStore {
	getLastAccessTimestamp( ip: string ): Promise< number | undefined >;

	/** Sets the last access timestamp and prepends `city` to the recent cities of `ip`. */
	recordAccess( ip: string, timestamp: number, city: string ): Promise< AccessRecord >;
}
