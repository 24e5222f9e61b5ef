export type {
	CredentialSource,
	Credentials,
	KeyMaterial,
	SignRequest,
	SignatureHeaders,
} from "./types.js";
export {
	loadCredentials,
	parsePrivateKey,
	sealCredentials,
	unwrapCredentials,
} from "./credentials.js";
export {
	DEFAULT_HEADER_PREFIX,
	RequestSigner,
	type SignerOptions,
	signatureMessage,
} from "./signer.js";
