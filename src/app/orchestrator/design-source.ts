import { loadDesignDocument } from "../../core/config-loader.js";
import { ConfigError } from "../../core/errors.js";

import type { DesignProbeResult, DesignSource } from "./ports.js";

/** Probes the design document on disk. Missing or invalid documents cancel the run. */
export class FileDesignSource implements DesignSource {
  constructor(private readonly designPath: string) {}

  async probe(): Promise<DesignProbeResult> {
    try {
      const definition = loadDesignDocument(this.designPath);
      return { ok: true, fingerprint: definition.source.fingerprint };
    } catch (err) {
      if (err instanceof ConfigError) {
        return { ok: false, reason: err.message };
      }
      throw err;
    }
  }
}
