import { Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import {
    AuthExpired,
    FatalGatewayError,
    QuotaExceeded,
    TransientNetworkError,
    UploadCredential,
    UploadGateway,
} from '@seedferry/sdk';
import { OneDriveAuth } from './onedrive.auth';

const TAG = '[onedrive]';
const GRAPH_URL = 'https://graph.microsoft.com/v1.0';

// Graph accepts single-request uploads up to 4 MiB; larger files go
// through an upload session in chunks that are multiples of 320 KiB.
export const SIMPLE_UPLOAD_LIMIT = 4 * 1024 * 1024;
export const CHUNK_SIZE = 10 * 1024 * 1024;

const uploadSessionSchema = z.object({ uploadUrl: z.string().url() });
const driveItemSchema = z.object({ id: z.string(), name: z.string(), size: z.number().optional() });
const graphErrorSchema = z.object({
    error: z.object({ code: z.string(), message: z.string().optional() }),
});

/** Joins OneDrive path segments: `joinRemote('/BTDownloads', 'a', 'b')` → `/BTDownloads/a/b`. */
export function joinRemote(...parts: string[]): string {
    const segments = parts.flatMap(p => p.split('/')).filter(s => s.length > 0 && s !== '.');
    return `/${segments.join('/')}`;
}

/** A Graph request rejected with a status that retrying will not fix. */
export class GraphRequestError extends FatalGatewayError {
    constructor(message: string, readonly status: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}

function encodeRemote(remotePath: string): string {
    return remotePath.split('/').filter(Boolean).map(encodeURIComponent).join('/');
}

/**
 * Upload gateway for OneDrive through Microsoft Graph. Files that already
 * exist remotely with the same size are skipped, so re-running an upload
 * that was cut off part way only sends what is missing.
 */
export class OneDriveUploadGateway implements UploadGateway {
    private readonly knownFolders = new Set<string>();

    constructor(
        private readonly auth: OneDriveAuth,
        private readonly http: AxiosInstance = axios.create({ timeout: 120_000, maxBodyLength: Infinity }),
    ) { }

    get interactive(): boolean {
        return this.auth.interactive;
    }

    ensureAuthenticated(): Promise<UploadCredential> {
        return this.auth.ensure();
    }

    async upload(localPath: string, remoteFolder: string): Promise<string> {
        let stat: Stats;
        try {
            stat = await fs.stat(localPath);
        } catch (err) {
            throw new FatalGatewayError(`local content missing at ${localPath}`, { cause: err });
        }

        if (!stat.isDirectory()) {
            await this.ensureFolder(joinRemote(remoteFolder));
            return this.uploadFile(localPath, joinRemote(remoteFolder), stat.size);
        }

        const target = joinRemote(remoteFolder, path.basename(localPath));
        await this.ensureFolder(target);
        let count = 0;
        for await (const file of walk(localPath)) {
            const relativeDir = path.relative(localPath, path.dirname(file.path)).split(path.sep).join('/');
            const folder = joinRemote(target, relativeDir);
            await this.ensureFolder(folder);
            await this.uploadFile(file.path, folder, file.size);
            count++;
        }
        console.log(`${TAG} uploaded ${count} files to ${target}`);
        return target;
    }

    private async uploadFile(localFile: string, remoteFolder: string, size: number): Promise<string> {
        const remotePath = joinRemote(remoteFolder, path.basename(localFile));

        const existing = await this.remoteItem(remotePath);
        if (existing?.size === size) {
            console.log(`${TAG} ${remotePath} already uploaded, skipping`);
            return remotePath;
        }

        console.log(`${TAG} uploading ${localFile} (${(size / 1024 / 1024).toFixed(2)} MB) to ${remotePath}`);
        if (size <= SIMPLE_UPLOAD_LIMIT) {
            const body = await fs.readFile(localFile);
            await this.graph('upload file', async token => this.http.put(
                `${GRAPH_URL}/me/drive/root:/${encodeRemote(remotePath)}:/content`,
                body,
                { headers: { Authorization: `Bearer ${token}`, 'Content-Type': 'application/octet-stream' } },
            ));
        } else {
            await this.uploadInChunks(localFile, remotePath, size);
        }
        return remotePath;
    }

    private async uploadInChunks(localFile: string, remotePath: string, size: number): Promise<void> {
        const session = await this.graph('create upload session', async token => this.http.post(
            `${GRAPH_URL}/me/drive/root:/${encodeRemote(remotePath)}:/createUploadSession`,
            { item: { '@microsoft.graph.conflictBehavior': 'replace' } },
            { headers: { Authorization: `Bearer ${token}` } },
        ));
        const parsed = uploadSessionSchema.safeParse(session);
        if (!parsed.success) throw new FatalGatewayError('upload session response has no uploadUrl');
        const { uploadUrl } = parsed.data;

        const handle = await fs.open(localFile, 'r');
        try {
            const buffer = Buffer.alloc(Math.min(CHUNK_SIZE, size));
            for (let start = 0; start < size; start += CHUNK_SIZE) {
                const { bytesRead } = await handle.read(buffer, 0, Math.min(CHUNK_SIZE, size - start), start);
                const end = start + bytesRead - 1;
                // the pre-authenticated upload URL must not carry the bearer token
                await this.graph('upload chunk', async () => this.http.put(uploadUrl, buffer.subarray(0, bytesRead), {
                    headers: {
                        'Content-Length': String(bytesRead),
                        'Content-Range': `bytes ${start}-${end}/${size}`,
                    },
                }));
                console.log(`${TAG} ${remotePath}: ${Math.round(((end + 1) / size) * 100)}%`);
            }
        } finally {
            await handle.close();
        }
    }

    // Creates each missing segment of `folder`, top down.
    private async ensureFolder(folder: string): Promise<void> {
        const segments = folder.split('/').filter(Boolean);
        let parent = '/';
        for (const segment of segments) {
            const current = joinRemote(parent, segment);
            if (!this.knownFolders.has(current)) {
                const existing = await this.remoteItem(current);
                if (!existing) await this.createFolder(parent, segment);
                this.knownFolders.add(current);
            }
            parent = current;
        }
    }

    private async createFolder(parent: string, name: string): Promise<void> {
        const url = parent === '/'
            ? `${GRAPH_URL}/me/drive/root/children`
            : `${GRAPH_URL}/me/drive/root:/${encodeRemote(parent)}:/children`;
        try {
            await this.graph('create folder', async token => this.http.post(
                url,
                { name, folder: {}, '@microsoft.graph.conflictBehavior': 'fail' },
                { headers: { Authorization: `Bearer ${token}` } },
            ));
            console.log(`${TAG} created folder ${joinRemote(parent, name)}`);
        } catch (err) {
            // created concurrently by someone else
            if (err instanceof GraphRequestError && err.status === 409) return;
            throw err;
        }
    }

    private async remoteItem(remotePath: string): Promise<z.infer<typeof driveItemSchema> | null> {
        try {
            const data = await this.graph('look up item', async token => this.http.get(
                `${GRAPH_URL}/me/drive/root:/${encodeRemote(remotePath)}`,
                { headers: { Authorization: `Bearer ${token}` } },
            ));
            const parsed = driveItemSchema.safeParse(data);
            return parsed.success ? parsed.data : null;
        } catch (err) {
            if (err instanceof GraphRequestError && err.status === 404) return null;
            throw err;
        }
    }

    private async graph(action: string, call: (token: string) => Promise<{ data: unknown }>): Promise<unknown> {
        const token = await this.auth.accessToken();
        try {
            const response = await call(token);
            return response.data;
        } catch (err) {
            throw this.toGatewayError(action, err);
        }
    }

    private toGatewayError(action: string, err: unknown): Error {
        if (!axios.isAxiosError(err)) return err instanceof Error ? err : new Error(String(err));

        const response = err.response;
        if (!response) {
            return new TransientNetworkError(`${action}: ${err.message}`, { cause: err });
        }

        const graphError = graphErrorSchema.safeParse(response.data);
        const code = graphError.success ? graphError.data.error.code : '';
        const detail = graphError.success ? graphError.data.error.message ?? code : err.message;
        const message = `${action} failed: HTTP ${response.status} ${detail}`;

        if (response.status === 401) {
            this.auth.invalidate();
            return new AuthExpired(message, { cause: err });
        }
        if (response.status === 507 || code === 'quotaLimitReached') {
            return new QuotaExceeded(message, { cause: err });
        }
        if (response.status === 408 || response.status === 429 || response.status >= 500) {
            return new TransientNetworkError(message, { cause: err });
        }
        return new GraphRequestError(message, response.status, { cause: err });
    }
}

interface LocalFile {
    path: string;
    size: number;
}

async function* walk(dir: string): AsyncGenerator<LocalFile> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            yield* walk(full);
        } else if (entry.isFile()) {
            const { size } = await fs.stat(full);
            yield { path: full, size };
        }
    }
}
