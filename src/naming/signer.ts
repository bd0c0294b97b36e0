import { createHash, createHmac } from "node:crypto";

export type SignOptions = {
  method?: "GET" | "PUT";
  contentType?: string;
};

/** Turns an object path into a url the runner can upload to or download from. */
export interface UrlSigner {
  sign(objectPath: string, opts?: SignOptions): string;
}

export const SIGNED_URL_TTL_SECONDS = 3 * 60 * 60;
export const SIGNING_ALGORITHM = "GOOG4-HMAC-SHA256";
const STORAGE_HOST = "storage.googleapis.com";
const CREDENTIAL_SUFFIX = "auto/storage/goog4_request";

/** RFC 3986 encoding; `encodeURIComponent` leaves `!'()*` alone. */
function rfc3986(value: string): string {
  return encodeURIComponent(value).replace(/[!'()*]/g, (c) => "%" + c.charCodeAt(0).toString(16).toUpperCase());
}

function hmac(key: string | Buffer, data: string): Buffer {
  return createHmac("sha256", key).update(data).digest();
}

/** `YYYYMMDDTHHMMSSZ` in UTC. */
export function signingTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
}

/**
 * V4 signed urls for an HMAC key (`GOOG4-HMAC-SHA256`), path style on
 * `storage.googleapis.com`. `account` is the HMAC access id, `key` its
 * secret. Urls expire SIGNED_URL_TTL_SECONDS after `now`.
 */
export class HmacUrlSigner implements UrlSigner {
  constructor(
    private readonly account: string,
    private readonly key: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  sign(objectPath: string, opts: SignOptions = {}): string {
    const method = opts.method ?? "PUT";
    const timestamp = signingTimestamp(this.now());
    const scope = `${timestamp.slice(0, 8)}/${CREDENTIAL_SUFFIX}`;

    const headers: Record<string, string> = { host: STORAGE_HOST };
    if (opts.contentType) headers["content-type"] = opts.contentType;
    const headerNames = Object.keys(headers).sort();
    const signedHeaders = headerNames.join(";");

    const params: Record<string, string> = {
      "X-Goog-Algorithm": SIGNING_ALGORITHM,
      "X-Goog-Credential": `${this.account}/${scope}`,
      "X-Goog-Date": timestamp,
      "X-Goog-Expires": String(SIGNED_URL_TTL_SECONDS),
      "X-Goog-SignedHeaders": signedHeaders,
    };
    const query = Object.keys(params)
      .sort()
      .map((k) => `${rfc3986(k)}=${rfc3986(params[k])}`)
      .join("&");
    const resource = objectPath.split("/").map(rfc3986).join("/");

    const canonicalRequest = [
      method,
      resource,
      query,
      headerNames.map((h) => `${h}:${headers[h]}\n`).join(""),
      signedHeaders,
      "UNSIGNED-PAYLOAD",
    ].join("\n");
    const stringToSign = [
      SIGNING_ALGORITHM,
      timestamp,
      scope,
      createHash("sha256").update(canonicalRequest).digest("hex"),
    ].join("\n");

    let signingKey = hmac(`GOOG4${this.key}`, timestamp.slice(0, 8));
    for (const part of CREDENTIAL_SUFFIX.split("/")) signingKey = hmac(signingKey, part);
    const signature = createHmac("sha256", signingKey).update(stringToSign).digest("hex");

    return `https://${STORAGE_HOST}${resource}?${query}&X-Goog-Signature=${signature}`;
  }
}
