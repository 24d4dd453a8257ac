import forge from "node-forge";
import * as crypto from "node:crypto";
import * as net from "node:net";
import { GenerationError, errorMessage } from "./errors.js";
import type { CertificateMaterial } from "./types.js";

/** RSA modulus size for generated keys. */
const RSA_KEY_BITS = 2048;

/** Organization written into the subject of generated certificates. */
const CERT_ORGANIZATION = "ssl-proxy";

/** 128-bit serial with the high bit cleared so the DER integer stays positive. */
function randomSerialNumber(): string {
  const bytes = crypto.randomBytes(16);
  bytes[0] = (bytes[0] & 0x7f) | 0x40;
  return bytes.toString("hex");
}

/** IP literals become iPAddress SAN entries, everything else a dNSName. */
function toAltName(name: string): { type: number; value?: string; ip?: string } {
  return net.isIP(name) ? { type: 7, ip: name } : { type: 2, value: name };
}

/**
 * Generate an RSA key pair and a self-signed certificate whose subject
 * alternative names are exactly `subjectNames`, in order. The certificate is
 * valid from now until now + `validityMs`.
 *
 * Pure computation: nothing is written to disk.
 */
export function generateKeys(
  validityMs: number,
  subjectNames: readonly string[]
): CertificateMaterial {
  if (subjectNames.length === 0) {
    throw new GenerationError("At least one subject name is required");
  }

  try {
    const keys = forge.pki.rsa.generateKeyPair(RSA_KEY_BITS);
    const cert = forge.pki.createCertificate();
    cert.publicKey = keys.publicKey;
    cert.serialNumber = randomSerialNumber();

    const now = new Date();
    cert.validity.notBefore = now;
    cert.validity.notAfter = new Date(now.getTime() + validityMs);

    const attrs = [
      { name: "commonName", value: subjectNames[0] },
      { name: "organizationName", value: CERT_ORGANIZATION },
    ];
    cert.setSubject(attrs);
    cert.setIssuer(attrs);
    cert.setExtensions([
      { name: "basicConstraints", cA: false },
      { name: "keyUsage", critical: true, digitalSignature: true, keyEncipherment: true },
      { name: "extKeyUsage", serverAuth: true },
      { name: "subjectAltName", altNames: subjectNames.map(toAltName) },
    ]);
    cert.sign(keys.privateKey, forge.md.sha256.create());

    const der = forge.asn1.toDer(forge.pki.certificateToAsn1(cert)).getBytes();
    return {
      cert: Buffer.from(forge.pki.certificateToPem(cert), "utf-8"),
      key: Buffer.from(forge.pki.privateKeyToPem(keys.privateKey), "utf-8"),
      fingerprint: crypto.createHash("sha256").update(Buffer.from(der, "binary")).digest(),
    };
  } catch (err: unknown) {
    throw new GenerationError(`Failed to generate self-signed certificate: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/** Render a fingerprint as colon-separated uppercase hex ("AB:CD:..."). */
export function formatFingerprint(fingerprint: Buffer): string {
  return Array.from(fingerprint, (b) => b.toString(16).padStart(2, "0").toUpperCase()).join(":");
}
