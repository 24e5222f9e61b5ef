/**
 * Opaque credential container and PEM loading.
 *
 * The parsed KeyObject is kept in a module-private WeakMap keyed by the
 * sealed object, so it is parsed once and never reachable through the value
 * handed to callers.
 */

import { type KeyObject, createPrivateKey } from "node:crypto";
import { readFile } from "node:fs/promises";
import { inspect } from "node:util";
import { CredentialError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { CredentialSource, Credentials, KeyMaterial } from "./types.js";

const REDACTED = "[REDACTED]";
const RSA_KEY_TYPES = new Set(["rsa", "rsa-pss"]);

const store = new WeakMap<object, KeyMaterial>();

class SealedCredentials {
	readonly __opaque = true as const;

	toString(): string {
		return REDACTED;
	}

	toJSON(): string {
		return REDACTED;
	}

	[inspect.custom](): string {
		return REDACTED;
	}
}

/** Seal a key id and parsed private key into opaque Credentials. */
export function sealCredentials(keyId: string, privateKey: KeyObject): Credentials {
	const sealed: { readonly __opaque: true } = new SealedCredentials();
	store.set(sealed, { keyId, privateKey });
	return sealed as Credentials;
}

/**
 * Retrieve the key material behind sealed Credentials.
 * @throws CredentialError if the object was not produced by this module
 */
export function unwrapCredentials(credentials: Credentials): KeyMaterial {
	const material = store.get(credentials);
	if (material === undefined) {
		throw new CredentialError("Invalid credentials object");
	}
	return material;
}

/**
 * Parse and validate a PEM-encoded RSA private key.
 * Accepts PKCS#1 (`BEGIN RSA PRIVATE KEY`) and PKCS#8 (`BEGIN PRIVATE KEY`).
 */
export function parsePrivateKey(pem: string): Result<KeyObject, CredentialError> {
	let key: KeyObject;
	try {
		key = createPrivateKey({ key: pem, format: "pem" });
	} catch (cause) {
		return err(new CredentialError("Private key is not a valid PEM key", { cause }));
	}
	const type = key.asymmetricKeyType;
	if (type === undefined || !RSA_KEY_TYPES.has(type)) {
		return err(new CredentialError("Private key must be an RSA key", { keyType: type ?? null }));
	}
	return ok(key);
}

/**
 * Load credentials from a key id plus inline PEM or a PEM file path.
 * Missing key id, missing key material, unreadable file and malformed PEM
 * are all CredentialError.
 */
export async function loadCredentials(
	source: CredentialSource,
): Promise<Result<Credentials, CredentialError>> {
	const keyId = source.keyId?.trim() ?? "";
	if (keyId.length === 0) {
		return err(new CredentialError("API key id is missing"));
	}

	let pem: string;
	if (source.privateKeyPem !== undefined && source.privateKeyPem.trim() !== "") {
		pem = source.privateKeyPem;
	} else if (source.privateKeyPath !== undefined && source.privateKeyPath.trim() !== "") {
		try {
			pem = await readFile(source.privateKeyPath, "utf8");
		} catch (cause) {
			return err(
				new CredentialError("Cannot read private key file", {
					path: source.privateKeyPath,
					cause,
				}),
			);
		}
	} else {
		return err(new CredentialError("Private key material is missing"));
	}

	const key = parsePrivateKey(pem);
	if (!key.ok) return key;
	return ok(sealCredentials(keyId, key.value));
}
