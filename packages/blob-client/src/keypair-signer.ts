/**
 * Local claim signing with ECDSA P-256 (Web Crypto)
 *
 * Signed blob layout: the unsigned JSON, trimmed, minus its closing brace,
 * followed by ,"camliSig":"<base64url signature>"}\n
 * The signature covers exactly the bytes before ,"camliSig".
 */

import {
  createSchemaBlob,
  SCHEMA_TYPE,
  SIGNATURE_KEY,
  type HashName,
  type SchemaBlob,
  type Signer,
} from "@blobshare/blob-core";

// ============================================================================
// Constants
// ============================================================================

const ALGORITHM = {
  name: "ECDSA",
  namedCurve: "P-256",
} as const;

const SIGN_ALGORITHM = {
  name: "ECDSA",
  hash: "SHA-256",
} as const;

const SIGNATURE_MARKER = `,"${SIGNATURE_KEY}":"`;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

// ============================================================================
// Types
// ============================================================================

/**
 * Stored keypair: "x.y" public coordinates and "d" private scalar (base64url)
 */
export interface SigningKeyPair {
  publicKey: string;
  privateKey: string;
}

// ============================================================================
// Base64url Encoding
// ============================================================================

/**
 * Encode bytes to base64url string
 */
export function base64urlEncode(data: Uint8Array): string {
  const base64 = btoa(String.fromCharCode(...data));
  return base64.replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/, "");
}

/**
 * Decode base64url string to bytes
 */
export function base64urlDecode(str: string): Uint8Array {
  const base64 = str.replace(/-/g, "+").replace(/_/g, "/");
  const padding = (4 - (base64.length % 4)) % 4;
  const binary = atob(base64 + "=".repeat(padding));
  return Uint8Array.from(binary, (c) => c.charCodeAt(0));
}

// ============================================================================
// Keys
// ============================================================================

/**
 * Generate a new ECDSA P-256 keypair
 */
export async function generateSigningKeyPair(): Promise<SigningKeyPair> {
  const keyPair = await crypto.subtle.generateKey(ALGORITHM, true, ["sign", "verify"]);
  const privateJwk = await crypto.subtle.exportKey("jwk", keyPair.privateKey);

  if (!privateJwk.x || !privateJwk.y || !privateJwk.d) {
    throw new Error("Exported key is missing EC coordinates");
  }

  return {
    publicKey: `${privateJwk.x}.${privateJwk.y}`,
    privateKey: privateJwk.d,
  };
}

function splitPublicKey(publicKey: string): { x: string; y: string } {
  const [x, y] = publicKey.split(".");
  if (!x || !y) {
    throw new Error("Public key must be formatted as x.y");
  }
  return { x, y };
}

async function importPrivateKey(keyPair: SigningKeyPair): Promise<CryptoKey> {
  const { x, y } = splitPublicKey(keyPair.publicKey);
  return crypto.subtle.importKey("jwk", { kty: "EC", crv: "P-256", x, y, d: keyPair.privateKey }, ALGORITHM, false, [
    "sign",
  ]);
}

async function importPublicKey(publicKey: string): Promise<CryptoKey> {
  const { x, y } = splitPublicKey(publicKey);
  return crypto.subtle.importKey("jwk", { kty: "EC", crv: "P-256", x, y }, ALGORITHM, false, ["verify"]);
}

/**
 * Public key schema blob; its ref is the signer identity placed in claims
 */
export function createPublicKeyBlob(publicKey: string, hashName: HashName): SchemaBlob {
  const { x, y } = splitPublicKey(publicKey);
  return createSchemaBlob({ camliType: SCHEMA_TYPE.PUBLIC_KEY, kty: "EC", crv: "P-256", x, y }, hashName);
}

// ============================================================================
// Signing
// ============================================================================

/**
 * Signer that signs schema blobs locally with a keypair
 */
export function createKeyPairSigner(keyPair: SigningKeyPair): Signer {
  return {
    sign: async (payload: Uint8Array): Promise<Uint8Array> => {
      const unsigned = decoder.decode(payload).trimEnd();
      if (!unsigned.startsWith("{") || !unsigned.endsWith("}")) {
        throw new Error("Payload is not a JSON object");
      }
      if (unsigned.includes(SIGNATURE_MARKER)) {
        throw new Error("Payload is already signed");
      }

      const signedPart = unsigned.slice(0, -1);
      const privateKey = await importPrivateKey(keyPair);
      const signature = await crypto.subtle.sign(SIGN_ALGORITHM, privateKey, encoder.encode(signedPart));

      return encoder.encode(`${signedPart}${SIGNATURE_MARKER}${base64urlEncode(new Uint8Array(signature))}"}\n`);
    },
  };
}

/**
 * Verify a blob signed by createKeyPairSigner against a public key
 */
export async function verifySignedBlob(signed: Uint8Array, publicKey: string): Promise<boolean> {
  const text = decoder.decode(signed).trimEnd();
  const markerIndex = text.lastIndexOf(SIGNATURE_MARKER);
  if (markerIndex === -1 || !text.endsWith('"}')) {
    return false;
  }

  const signedPart = text.slice(0, markerIndex);
  const signature = base64urlDecode(text.slice(markerIndex + SIGNATURE_MARKER.length, -2));
  const key = await importPublicKey(publicKey);
  return crypto.subtle.verify(SIGN_ALGORITHM, key, new Uint8Array(signature), encoder.encode(signedPart));
}
