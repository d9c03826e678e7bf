import fs from 'fs/promises';
import path from 'path';
import {
    AccountInfo,
    AuthenticationResult,
    DeviceCodeRequest,
    ICachePlugin,
    InteractionRequiredAuthError,
    PublicClientApplication,
    SilentFlowRequest,
    TokenCacheContext,
} from '@azure/msal-node';
import { AuthExpired, AuthRequired, TransientNetworkError, UploadCredential } from '@seedferry/sdk';

const TAG = '[onedrive]';
// Refresh a little before expiry so a long upload does not start on a dying token.
const REFRESH_MARGIN_MS = 5 * 60_000;

export const ONEDRIVE_SCOPES = ['Files.ReadWrite', 'Files.ReadWrite.All'];

/** The parts of the MSAL public client this module calls. */
export interface MsalClient {
    getTokenCache(): { getAllAccounts(): Promise<AccountInfo[]> };
    acquireTokenSilent(request: SilentFlowRequest): Promise<AuthenticationResult>;
    acquireTokenByDeviceCode(request: DeviceCodeRequest): Promise<AuthenticationResult | null>;
}

/**
 * Persists the MSAL token cache to a file. When the file does not exist yet
 * the cache is seeded from `seed`, the serialized cache of an earlier
 * sign-in handed in through configuration (headless runs).
 */
export class FileTokenCache implements ICachePlugin {
    constructor(private readonly file: string, private readonly seed?: string) { }

    async beforeCacheAccess(context: TokenCacheContext): Promise<void> {
        const data = await this.read();
        if (data) context.tokenCache.deserialize(data);
    }

    async afterCacheAccess(context: TokenCacheContext): Promise<void> {
        if (!context.cacheHasChanged) return;
        const tmp = `${this.file}.${process.pid}.tmp`;
        await fs.mkdir(path.dirname(path.resolve(this.file)), { recursive: true });
        await fs.writeFile(tmp, context.tokenCache.serialize(), { encoding: 'utf8', mode: 0o600 });
        await fs.rename(tmp, this.file);
    }

    private async read(): Promise<string | null> {
        try {
            return await fs.readFile(this.file, 'utf8');
        } catch (err) {
            if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
                return this.seed || null;
            }
            throw err;
        }
    }
}

export interface OneDriveAuthConfig {
    clientId: string;
    tenantId: string;
    tokenPath: string;
    /** Serialized token cache from a previous sign-in. */
    token?: string;
    interactive: boolean;
}

// Stands in when no application is registered: no cached accounts and no
// way to sign in, so every request ends in AuthRequired.
const unconfiguredClient: MsalClient = {
    getTokenCache: () => ({ getAllAccounts: async () => [] }),
    acquireTokenSilent: async () => {
        throw new AuthRequired('ONEDRIVE_CLIENT_ID is not set');
    },
    acquireTokenByDeviceCode: async () => {
        throw new AuthRequired('ONEDRIVE_CLIENT_ID is not set');
    },
};

export function createMsalClient(config: OneDriveAuthConfig): MsalClient {
    if (!config.clientId) return unconfiguredClient;
    return new PublicClientApplication({
        auth: {
            clientId: config.clientId,
            authority: `https://login.microsoftonline.com/${config.tenantId}`,
        },
        cache: { cachePlugin: new FileTokenCache(config.tokenPath, config.token) },
    });
}

/**
 * Hands out OneDrive access tokens. Silent refresh from the cache first;
 * the device-code flow only when `interactive` is set.
 */
export class OneDriveAuth {
    private current: AuthenticationResult | null = null;

    constructor(
        private readonly client: MsalClient,
        readonly interactive: boolean,
        private readonly scopes: string[] = ONEDRIVE_SCOPES,
        private readonly clock: () => Date = () => new Date(),
    ) { }

    async ensure(): Promise<UploadCredential> {
        const result = await this.acquire();
        return {
            account: result.account?.username ?? 'unknown',
            expiresAt: result.expiresOn,
        };
    }

    async accessToken(): Promise<string> {
        const result = await this.acquire();
        return result.accessToken;
    }

    /** Drops the in-memory token, e.g. after Graph answered 401. */
    invalidate(): void {
        this.current = null;
    }

    private async acquire(): Promise<AuthenticationResult> {
        if (this.current && !this.expiringSoon(this.current)) return this.current;

        const accounts = await this.client.getTokenCache().getAllAccounts();
        const account = accounts[0];

        if (account) {
            try {
                this.current = await this.client.acquireTokenSilent({ account, scopes: this.scopes });
                return this.current;
            } catch (err) {
                if (!(err instanceof InteractionRequiredAuthError)) {
                    throw new TransientNetworkError(
                        `token refresh failed: ${err instanceof Error ? err.message : String(err)}`,
                        { cause: err },
                    );
                }
                if (!this.interactive) {
                    throw new AuthExpired('stored OneDrive credential was rejected; run the auth command again', { cause: err });
                }
                console.warn(`${TAG} stored credential rejected, falling back to device code sign-in`);
            }
        }

        if (!this.interactive) throw new AuthRequired();
        return this.deviceCodeFlow();
    }

    private async deviceCodeFlow(): Promise<AuthenticationResult> {
        let result: AuthenticationResult | null;
        try {
            result = await this.client.acquireTokenByDeviceCode({
                scopes: this.scopes,
                deviceCodeCallback: response => console.log(`\n${response.message}\n`),
            });
        } catch (err) {
            throw new AuthRequired(`device code sign-in failed: ${err instanceof Error ? err.message : String(err)}`);
        }
        if (!result) throw new AuthRequired('device code sign-in returned no token');

        console.log(`${TAG} signed in as ${result.account?.username ?? 'unknown'}`);
        this.current = result;
        return result;
    }

    private expiringSoon(result: AuthenticationResult): boolean {
        if (!result.expiresOn) return false;
        return result.expiresOn.getTime() - this.clock().getTime() < REFRESH_MARGIN_MS;
    }
}
