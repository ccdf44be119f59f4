import { IllegalStateTransitionError, UploadExpiredError, UploadStateMismatchError } from "../util/Errors";

export type UploadState = "pending" | "uploading" | "uploaded" | "attached" | "failed" | "expired";

/**
 * Every legal transition. Anything not listed here is a programming error.
 */
export const UPLOAD_TRANSITIONS: Readonly<Record<UploadState, ReadonlyArray<UploadState>>> = Object.freeze({
	pending: ["uploading"],
	uploading: ["uploaded", "failed"],
	uploaded: ["attached", "expired"],
	expired: ["uploading"],
	attached: [],
	failed: [],
});

export function canTransition(from: UploadState, to: UploadState): boolean {
	return UPLOAD_TRANSITIONS[from].includes(to);
}

export interface UploadRecord {
	state: UploadState;
	/** Remote slot id of the current transfer */
	uploadId?: string | undefined;
	/** Part tags of the current transfer, in part order */
	partTags: Array<string>;
	/** When the current transfer reached `uploaded` */
	uploadedAt?: number | undefined;
	/** Times the upload was re-driven after expiring */
	reuploads: number;
}

/**
 * Lifecycle of one attachment: pending, uploading, uploaded and finally attached,
 * with failed and expired as the ways out.
 */
export class UploadStateMachine {
	private readonly current: UploadRecord = { state: "pending", partTags: [], reuploads: 0 };

	constructor(
		readonly key: string,
		private readonly now: () => number = Date.now,
	) {}

	get state(): UploadState {
		return this.current.state;
	}

	get record(): Readonly<UploadRecord> {
		return { ...this.current, partTags: [...this.current.partTags] };
	}

	isTerminal(): boolean {
		return this.current.state === "attached" || this.current.state === "failed";
	}

	transition(to: UploadState): void {
		const from = this.current.state;
		if (!canTransition(from, to)) {
			throw new IllegalStateTransitionError(from, to);
		}
		if (from === "expired" && to === "uploading") {
			this.current.reuploads++;
			this.current.uploadId = undefined;
			this.current.partTags = [];
			this.current.uploadedAt = undefined;
		}
		if (to === "uploaded") {
			this.current.uploadedAt = this.now();
		}
		this.current.state = to;
	}

	/** Records the finished transfer and moves to `uploaded`. */
	markUploaded(uploadId: string, partTags: Array<string> = []): void {
		this.transition("uploaded");
		this.current.uploadId = uploadId;
		this.current.partTags = [...partTags];
	}

	/** True while the upload may still be referenced. */
	isAttachWindowOpen(ttlMs: number): boolean {
		const { state, uploadedAt } = this.current;
		return state === "uploaded" && uploadedAt !== undefined && this.now() - uploadedAt < ttlMs;
	}

	assertCanAttach(): void {
		if (this.current.state === "expired") {
			throw new UploadExpiredError(this.key, { reuploads: this.current.reuploads });
		}
		if (this.current.state !== "uploaded") {
			throw new UploadStateMismatchError(this.key, this.current.state);
		}
	}
}
