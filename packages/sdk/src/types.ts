// Contracts between the task engine and the transfer back ends.
// Adapters implement these; the engine never reaches past them.

/** What the operator handed us: a magnet URI or a path to a .torrent file. */
export type TransferSource = string;

export type DownloadState = 'queued' | 'active' | 'complete' | 'error';

export interface DownloadProgress {
    /** 0..1 */
    fraction: number;
    bytesDone: number;
    bytesTotal: number;
}

export interface DownloadStatus {
    state: DownloadState;
    progress: DownloadProgress;
    /** Torrent name once metadata is known. */
    name?: string;
    /** Set once state is `complete`: the file or directory on disk. */
    localPath?: string;
    /** Engine-reported reason, set when state is `error`. */
    error?: string;
}

export interface DownloadGateway {
    /**
     * Hands a source to the download engine.
     * Rejects with `InvalidSource` when the source cannot be parsed.
     * @returns an opaque handle that survives engine restarts
     */
    submit(source: TransferSource): Promise<string>;
    status(handle: string): Promise<DownloadStatus>;
    cancel(handle: string, purgeFiles: boolean): Promise<void>;
}

export interface UploadCredential {
    account: string;
    expiresAt: Date | null;
}

export interface UploadGateway {
    /**
     * Whether `ensureAuthenticated()` may block on an operator completing
     * a device-code exchange. Headless runs set this to false and rely on
     * a credential supplied through configuration.
     */
    readonly interactive: boolean;
    ensureAuthenticated(): Promise<UploadCredential>;
    /**
     * Uploads a file or a whole directory tree.
     * @returns the remote path of the uploaded item
     */
    upload(localPath: string, remoteFolder: string): Promise<string>;
}
