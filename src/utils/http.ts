import axios, { type AxiosInstance } from "axios";
import fs from "node:fs";
import http from "node:http";
import https from "node:https";
import path from "node:path";
import type { Config } from "../config.js";

export const PACKAGE_NAME = "idloc-client";

/** Version from package.json, which sits one level above both src/ and dist/. */
export function packageVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, "..", "..", "package.json"), "utf-8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch {
    // running from an unusual layout; fall through
  }
  return "0.0.0";
}

/** One shared axios instance for every client. Timeout is configuration, not a constant. */
export function createHttpClient(config: Pick<Config, "timeoutMs">): AxiosInstance {
  return axios.create({
    timeout: config.timeoutMs,
    headers: { "User-Agent": `${PACKAGE_NAME}/${packageVersion()}` },
    httpAgent: new http.Agent({ keepAlive: true }),
    httpsAgent: new https.Agent({ keepAlive: true }),
  });
}
