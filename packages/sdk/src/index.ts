// public api for @seedferry/sdk
// usage:
//   import { DownloadGateway, InvalidSource } from '@seedferry/sdk';
//   class MyEngine implements DownloadGateway { ... }

export type {
    TransferSource,
    DownloadState,
    DownloadProgress,
    DownloadStatus,
    DownloadGateway,
    UploadCredential,
    UploadGateway,
} from './types';

export {
    GatewayError,
    InputError,
    InvalidSource,
    TransientError,
    TransientNetworkError,
    AuthError,
    AuthRequired,
    AuthExpired,
    FatalGatewayError,
    QuotaExceeded,
    classifyError,
} from './errors';
export type { ErrorKind, ClassifiedError } from './errors';

export { isMagnetUri } from './source';
