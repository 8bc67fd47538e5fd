/**
 * Durable storage for a single JSON document, such as the copy engine's
 * trade cursor. Implementations throw on I/O failure.
 */
export interface StateStore {
	/** @returns the stored document, or null when none was written yet */
	read(): Promise<string | null>;
	write(json: string): Promise<void>;
}
