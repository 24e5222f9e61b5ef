/**
 * Auth bounded context — type definitions.
 *
 * Credentials are an opaque branded type so key material cannot reach a log
 * line by accident; only the signer unwraps them.
 */

import type { KeyObject } from "node:crypto";

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Where the key id and private key come from. Inline PEM wins over a file path. */
export interface CredentialSource {
	readonly keyId?: string | undefined;
	readonly privateKeyPem?: string | undefined;
	readonly privateKeyPath?: string | undefined;
}

/** Unsealed key material: the API key id and the parsed RSA private key. */
export interface KeyMaterial {
	readonly keyId: string;
	readonly privateKey: KeyObject;
}

/**
 * Opaque credential container. `toString`, `toJSON` and Node inspect all
 * yield "[REDACTED]". Created by `loadCredentials()` / `sealCredentials()`.
 */
export type Credentials = Brand<{ readonly __opaque: true }, "Credentials">;

export interface SignRequest {
	/** HTTP verb of the signed request; `GET` for the WebSocket upgrade */
	readonly method: string;
	/** Request path, e.g. `/trade-api/ws/v2` */
	readonly path: string;
}

/** `<prefix>-KEY`, `<prefix>-SIGNATURE` and `<prefix>-TIMESTAMP`. */
export type SignatureHeaders = Readonly<Record<string, string>>;
