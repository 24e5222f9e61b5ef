/**
 * RSA-PSS request signing for the venue's access headers.
 */

import { constants, sign } from "node:crypto";
import { SigningError } from "../shared/errors.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { unwrapCredentials } from "./credentials.js";
import type { Credentials, SignRequest, SignatureHeaders } from "./types.js";

const METHOD_RE = /^[A-Z]+$/;

export const DEFAULT_HEADER_PREFIX = "KALSHI-ACCESS";

export interface SignerOptions {
	readonly clock?: Clock | undefined;
	/** Header name prefix; defaults to `KALSHI-ACCESS` */
	readonly headerPrefix?: string | undefined;
}

/** The exact byte string that gets signed: `<timestampMs><METHOD><path>`. */
export function signatureMessage(timestampMs: number, method: string, path: string): string {
	return `${timestampMs}${method}${path}`;
}

/**
 * Produces fresh access headers for each connect attempt.
 *
 * Signature = base64(RSA-PSS(SHA-256, MGF1-SHA-256, salt = digest length)).
 *
 * @example
 * ```ts
 * const signer = new RequestSigner(credentials);
 * const headers = signer.sign({ method: "GET", path: "/trade-api/ws/v2" });
 * ```
 */
export class RequestSigner {
	private readonly credentials: Credentials;
	private readonly clock: Clock;
	private readonly prefix: string;

	constructor(credentials: Credentials, options: SignerOptions = {}) {
		this.credentials = credentials;
		this.clock = options.clock ?? SystemClock;
		this.prefix = options.headerPrefix ?? DEFAULT_HEADER_PREFIX;
	}

	/**
	 * @throws CredentialError if the credentials object is not a sealed one
	 * @throws SigningError if the request is malformed or the crypto operation fails
	 */
	sign(request: SignRequest): SignatureHeaders {
		const { keyId, privateKey } = unwrapCredentials(this.credentials);
		const method = request.method.toUpperCase();
		if (!METHOD_RE.test(method)) {
			throw new SigningError("Method must contain only ASCII letters", { method: request.method });
		}
		if (!request.path.startsWith("/")) {
			throw new SigningError("Path must start with /", { path: request.path });
		}

		const timestampMs = this.clock.now();
		const message = signatureMessage(timestampMs, method, request.path);

		let signature: Buffer;
		try {
			signature = sign("sha256", Buffer.from(message, "utf8"), {
				key: privateKey,
				padding: constants.RSA_PKCS1_PSS_PADDING,
				saltLength: constants.RSA_PSS_SALTLEN_DIGEST,
			});
		} catch (cause) {
			throw new SigningError("RSA-PSS signing failed", { cause });
		}

		return {
			[`${this.prefix}-KEY`]: keyId,
			[`${this.prefix}-SIGNATURE`]: signature.toString("base64"),
			[`${this.prefix}-TIMESTAMP`]: String(timestampMs),
		};
	}
}
