import fs from 'fs/promises';
import path from 'path';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import {
    AuthRequired,
    DownloadGateway,
    DownloadStatus,
    FatalGatewayError,
    InvalidSource,
    isMagnetUri,
    TransientNetworkError,
} from '@seedferry/sdk';

const TAG = '[transmission]';
const SESSION_HEADER = 'x-transmission-session-id';

// Transmission's torrent error codes: 1 tracker warning, 2 tracker error,
// 3 local error. Tracker trouble usually clears up on its own.
const LOCAL_ERROR = 3;
// status codes 0..3: stopped, check-wait, check, download-wait
const QUEUED_STATUSES = new Set([0, 1, 2, 3]);

const STATUS_FIELDS = [
    'hashString', 'name', 'status', 'error', 'errorString', 'percentDone',
    'metadataPercentComplete', 'haveValid', 'sizeWhenDone', 'leftUntilDone', 'downloadDir',
];

export interface TransmissionConfig {
    url: string;
    username?: string;
    password?: string;
    downloadDir: string;
    /** KB/s, 0 for unlimited */
    maxDownloadRate: number;
    /** KB/s, 0 for unlimited */
    maxUploadRate: number;
}

const rpcResponseSchema = z.object({
    result: z.string(),
    arguments: z.unknown().optional(),
});

const addedTorrentSchema = z.object({ hashString: z.string(), name: z.string().optional() });

const torrentAddSchema = z.object({
    'torrent-added': addedTorrentSchema.optional(),
    'torrent-duplicate': addedTorrentSchema.optional(),
});

const torrentSchema = z.object({
    hashString: z.string(),
    name: z.string(),
    status: z.number(),
    error: z.number(),
    errorString: z.string(),
    percentDone: z.number(),
    metadataPercentComplete: z.number(),
    haveValid: z.number(),
    sizeWhenDone: z.number(),
    leftUntilDone: z.number(),
    downloadDir: z.string(),
});

const torrentGetSchema = z.object({ torrents: z.array(torrentSchema) });

type Torrent = z.infer<typeof torrentSchema>;

/**
 * Download gateway over the Transmission daemon's JSON-RPC interface.
 * Handles are info hashes, so they stay valid across daemon restarts.
 */
export class TransmissionDownloadGateway implements DownloadGateway {
    private sessionId: string | null = null;
    private limitsApplied = false;

    constructor(
        private readonly config: TransmissionConfig,
        private readonly http: AxiosInstance = axios.create({ timeout: 30_000 }),
    ) { }

    async submit(source: string): Promise<string> {
        const args = await this.addArguments(source);
        await this.applySpeedLimits();

        let added: z.infer<typeof torrentAddSchema>;
        try {
            added = await this.rpc('torrent-add', args, torrentAddSchema);
        } catch (err) {
            if (err instanceof FatalGatewayError && /invalid or corrupt|unrecognized info/i.test(err.message)) {
                throw new InvalidSource(source, 'rejected by transmission as invalid or corrupt');
            }
            throw err;
        }

        const torrent = added['torrent-added'] ?? added['torrent-duplicate'];
        if (!torrent) {
            throw new FatalGatewayError('transmission accepted the torrent but returned no hash');
        }
        console.log(`${TAG} added ${torrent.name ?? source.slice(0, 60)} (${torrent.hashString})`);
        return torrent.hashString;
    }

    async status(handle: string): Promise<DownloadStatus> {
        const res = await this.rpc('torrent-get', { ids: [handle], fields: STATUS_FIELDS }, torrentGetSchema);
        const torrent = res.torrents.find(t => t.hashString.toLowerCase() === handle.toLowerCase());
        if (!torrent) {
            return {
                state: 'error',
                progress: { fraction: 0, bytesDone: 0, bytesTotal: 0 },
                error: `torrent ${handle} is not known to transmission`,
            };
        }
        return toStatus(torrent);
    }

    async cancel(handle: string, purgeFiles: boolean): Promise<void> {
        await this.rpc('torrent-remove', { ids: [handle], 'delete-local-data': purgeFiles }, z.unknown());
        console.log(`${TAG} removed ${handle} (delete local data: ${purgeFiles})`);
    }

    private async addArguments(source: string): Promise<Record<string, string>> {
        const base = { 'download-dir': this.config.downloadDir };

        if (isMagnetUri(source) || /^https?:\/\//i.test(source)) {
            return { ...base, filename: source };
        }
        if (source.startsWith('magnet:')) {
            throw new InvalidSource(source, 'magnet URI carries no BitTorrent info hash');
        }
        if (!source.toLowerCase().endsWith('.torrent')) {
            throw new InvalidSource(source, 'not a magnet URI, torrent URL or .torrent file');
        }

        let metainfo: Buffer;
        try {
            metainfo = await fs.readFile(source);
        } catch (err) {
            throw new InvalidSource(source, `cannot read torrent file: ${err instanceof Error ? err.message : String(err)}`);
        }
        return { ...base, metainfo: metainfo.toString('base64') };
    }

    private async applySpeedLimits(): Promise<void> {
        if (this.limitsApplied) return;
        const { maxDownloadRate, maxUploadRate } = this.config;
        await this.rpc('session-set', {
            'speed-limit-down': maxDownloadRate,
            'speed-limit-down-enabled': maxDownloadRate > 0,
            'speed-limit-up': maxUploadRate,
            'speed-limit-up-enabled': maxUploadRate > 0,
        }, z.unknown());
        this.limitsApplied = true;
        console.log(`${TAG} speed limits: down ${maxDownloadRate || 'unlimited'} KB/s, up ${maxUploadRate || 'unlimited'} KB/s`);
    }

    private async rpc<T>(method: string, args: Record<string, unknown>, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        // First call of a session is answered with 409 and the id to use.
        for (let attempt = 0; attempt < 2; attempt++) {
            const response = await this.post(method, args);

            if (response.status === 409) {
                const id = response.headers[SESSION_HEADER];
                if (typeof id !== 'string') {
                    throw new FatalGatewayError('transmission answered 409 without a session id');
                }
                this.sessionId = id;
                continue;
            }
            if (response.status === 401 || response.status === 403) {
                throw new AuthRequired(`transmission rejected the RPC credentials (${response.status})`);
            }
            if (response.status >= 500 || response.status === 408 || response.status === 429) {
                throw new TransientNetworkError(`transmission ${method}: HTTP ${response.status}`);
            }
            if (response.status !== 200) {
                throw new FatalGatewayError(`transmission ${method}: HTTP ${response.status}`);
            }

            const envelope = rpcResponseSchema.safeParse(response.data);
            if (!envelope.success) {
                throw new FatalGatewayError(`transmission ${method}: unexpected response body`);
            }
            if (envelope.data.result !== 'success') {
                throw new FatalGatewayError(`transmission ${method}: ${envelope.data.result}`);
            }
            const parsed = schema.safeParse(envelope.data.arguments ?? {});
            if (!parsed.success) {
                throw new FatalGatewayError(`transmission ${method}: unexpected arguments (${parsed.error.issues[0]?.message})`);
            }
            return parsed.data;
        }
        throw new TransientNetworkError('transmission kept rejecting the session id');
    }

    private async post(method: string, args: Record<string, unknown>): Promise<AxiosResponse<unknown>> {
        const { username, password } = this.config;
        try {
            return await this.http.post<unknown>(
                this.config.url,
                { method, arguments: args },
                {
                    headers: this.sessionId ? { [SESSION_HEADER]: this.sessionId } : {},
                    auth: username ? { username, password: password ?? '' } : undefined,
                    validateStatus: () => true,
                },
            );
        } catch (err) {
            throw new TransientNetworkError(
                `transmission unreachable at ${this.config.url}: ${err instanceof Error ? err.message : String(err)}`,
                { cause: err },
            );
        }
    }
}

function toStatus(torrent: Torrent): DownloadStatus {
    const progress = {
        fraction: torrent.percentDone,
        bytesDone: torrent.haveValid,
        bytesTotal: torrent.sizeWhenDone,
    };

    if (torrent.error === LOCAL_ERROR) {
        return { state: 'error', progress, name: torrent.name, error: torrent.errorString || 'local error' };
    }

    const hasMetadata = torrent.metadataPercentComplete >= 1;
    if (hasMetadata && torrent.sizeWhenDone > 0 && torrent.leftUntilDone === 0) {
        return {
            state: 'complete',
            progress: { ...progress, fraction: 1 },
            name: torrent.name,
            localPath: path.join(torrent.downloadDir, torrent.name),
        };
    }

    return {
        state: QUEUED_STATUSES.has(torrent.status) ? 'queued' : 'active',
        progress,
        name: torrent.name,
    };
}
