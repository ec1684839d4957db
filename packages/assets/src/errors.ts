/**
 * `@trialpack/assets` - Error definitions
 */

import { NetworkError, NetworkErrorCode } from '@trialpack/http';
import {
    AssetErrorCode,
    type AssetFailure,
    type AssetReference,
    type AssetRole,
} from '@trialpack/types';

/**
 * A single asset that could not be fetched. Never fatal for a run: the
 * fetcher turns it into a failed record and carries on.
 */
export class AssetError extends Error {
    readonly name = 'AssetError';

    constructor(
        public readonly code: AssetErrorCode,
        public readonly url: string,
        public readonly role: AssetRole,
        message: string,
        public readonly status?: number,
        cause?: unknown,
    ) {
        super(message, cause !== undefined ? { cause } : undefined);
        Error.captureStackTrace?.(this, AssetError);
    }

    /**
     * Classifies a network failure of `reference`.
     */
    static fromNetworkError(reference: AssetReference, error: NetworkError): AssetError {
        let code: AssetErrorCode;
        if (error.code === NetworkErrorCode.INSECURE_URL) {
            code = AssetErrorCode.BLOCKED;
        } else if (error.isNotFound) {
            code = AssetErrorCode.NOT_FOUND;
        } else if (error.status !== undefined) {
            code = AssetErrorCode.HTTP_ERROR;
        } else {
            code = AssetErrorCode.NETWORK;
        }
        return new AssetError(
            code,
            reference.url,
            reference.role,
            error.message,
            error.status,
            error,
        );
    }

    /** Plain form stored in records and reports */
    toFailure(): AssetFailure {
        const failure: AssetFailure = {
            url: this.url,
            role: this.role,
            code: this.code,
            message: this.message,
        };
        if (this.status !== undefined) {
            failure.status = this.status;
        }
        return failure;
    }
}
