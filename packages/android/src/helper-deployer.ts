/**
 * scrcpy-server deployment to Android devices
 * Pushes the helper only when the device copy is missing or stale
 */

import { readFile } from 'fs/promises';
import { DeployFailedError, errorMessage } from '@droidrelay/core';
import type { DeviceLink } from './device-link';

export interface HelperArtifact {
  version: string;
  bytes: Uint8Array;
  remotePath: string;
}

interface ProbeResult {
  version: string | null;
  size: number | null;
}

export type DeployOutcome = 'pushed' | 'skipped';

/**
 * Read the helper from local disk
 */
export async function loadHelperArtifact(localPath: string, version: string, remotePath: string): Promise<HelperArtifact> {
  try {
    const bytes = await readFile(localPath);
    return { version, bytes: new Uint8Array(bytes), remotePath };
  } catch (error) {
    throw new Error(`Helper artifact not readable at ${localPath}: ${errorMessage(error)}`, { cause: error });
  }
}

function markerPath(artifact: HelperArtifact): string {
  return `${artifact.remotePath}.version`;
}

export class HelperDeployer {
  /**
   * Make sure the device holds this exact artifact.
   * A failed push or verification is retried once.
   */
  async deploy(link: DeviceLink, artifact: HelperArtifact): Promise<DeployOutcome> {
    const { serial } = link;

    let current: ProbeResult;
    try {
      current = await this.probe(link, artifact);
    } catch (error) {
      throw new DeployFailedError(serial, `probe failed: ${errorMessage(error)}`, { cause: error });
    }

    if (this.matches(current, artifact)) {
      console.log(`[HelperDeployer] ✓ Helper v${artifact.version} already on ${serial}`);
      return 'skipped';
    }

    let lastReason = 'not attempted';
    let lastError: unknown;

    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        console.log(`[HelperDeployer] Pushing helper v${artifact.version} to ${serial} (attempt ${attempt})...`);
        await link.pushFile(artifact.bytes, artifact.remotePath);
        await link.execShell(`chmod 644 ${artifact.remotePath}`);
        await link.execShell(`echo ${artifact.version} > ${markerPath(artifact)}`);

        const placed = await this.probe(link, artifact);
        if (this.matches(placed, artifact)) {
          console.log(`[HelperDeployer] ✓ Helper v${artifact.version} pushed to ${serial} at ${artifact.remotePath}`);
          return 'pushed';
        }

        lastReason = `verification failed (version ${placed.version ?? 'missing'}, size ${placed.size ?? 'missing'})`;
        lastError = undefined;
      } catch (error) {
        lastReason = errorMessage(error);
        lastError = error;
      }

      console.warn(`[HelperDeployer] Deploy to ${serial} failed: ${lastReason}`);
    }

    throw new DeployFailedError(serial, lastReason, { cause: lastError });
  }

  /**
   * Delete the helper and its version marker
   */
  async remove(link: DeviceLink, artifact: HelperArtifact): Promise<void> {
    await link.execShell(`rm -f ${artifact.remotePath} ${markerPath(artifact)}`);
    console.log(`[HelperDeployer] Removed helper from ${link.serial}`);
  }

  /**
   * Version marker and file size in one shell round trip: "<version>|<size>"
   */
  private async probe(link: DeviceLink, artifact: HelperArtifact): Promise<ProbeResult> {
    const output = await link.execShell(
      `echo "$(cat ${markerPath(artifact)} 2>/dev/null)|$(stat -c %s ${artifact.remotePath} 2>/dev/null)"`
    );

    const [version = '', size = ''] = output.trim().split('|');
    const parsedSize = parseInt(size, 10);
    return {
      version: version.trim() || null,
      size: isNaN(parsedSize) ? null : parsedSize,
    };
  }

  private matches(probe: ProbeResult, artifact: HelperArtifact): boolean {
    return probe.version === artifact.version && probe.size === artifact.bytes.byteLength;
  }
}
