import {
	ProviderHttpError,
	UpstreamResponseFormatError,
	UpstreamTimeoutError,
	UpstreamUnreachableError
} from "../providers/provider-transport.js";

export interface ProxyFailureSummary {
	httpStatus: number;
	errorCode: string;
	errorMessage: string;
}

/**
 * Status and code a failed provider call maps to, shared by the usage log and
 * the HTTP error handler.
 */
export function describeProxyFailure(error: unknown): ProxyFailureSummary {
	if (error instanceof ProviderHttpError) {
		return { httpStatus: error.status, errorCode: error.code, errorMessage: error.message };
	}

	if (error instanceof UpstreamTimeoutError) {
		return { httpStatus: 504, errorCode: error.code, errorMessage: error.message };
	}

	if (
		error instanceof UpstreamUnreachableError ||
		error instanceof UpstreamResponseFormatError
	) {
		return { httpStatus: 502, errorCode: error.code, errorMessage: error.message };
	}

	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return { httpStatus: 500, errorCode: error.code, errorMessage: error.message };
	}

	return {
		httpStatus: 500,
		errorCode: "INTERNAL_ERROR",
		errorMessage: error instanceof Error ? error.message : "Unexpected error"
	};
}
