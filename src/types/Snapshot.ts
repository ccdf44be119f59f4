/**
 * Point-in-time modification markers of a remote resource and its blocks.
 * Used only for conflict detection.
 */
export interface PageSnapshot {
	readonly resourceId: string;
	readonly lastModified: string;
	readonly blocks: ReadonlyMap<string, string>;
}
