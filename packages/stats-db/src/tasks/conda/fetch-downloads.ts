import type { AnacondaApiClient, AnacondaPackage } from "../../conda-client";
import { keyPath } from "../../topology";
import type {
  CountSource,
  DateString,
  DownloadSnapshot,
  SnapshotEntry,
} from "../../types";
import { chunk, delay } from "../../utils";
import { retrievePackageNames } from "./fetch-package-names";

const RATE_LIMIT_DELAY = 50; // ms between requests
const DOWNLOADABLE_LABEL = "main";
const DOWNLOADABLE_TYPE = "conda";

export interface AnacondaCountSourceOptions {
  channels: readonly string[];
  concurrency: number;
  rateLimitDelay?: number;
  /** Defaults to every package found in the channel's repodata. */
  packageNames?: (channel: string) => Promise<string[]>;
}

/**
 * Leaf entries of one package: one per `main`-labelled conda file, keyed by
 * (channel, package, version, subdir, file name).
 */
export function packageDownloadCounts(
  channel: string,
  packageName: string,
  info: AnacondaPackage
): SnapshotEntry[] {
  const entries: SnapshotEntry[] = [];
  for (const file of info.files) {
    if (!file.labels.includes(DOWNLOADABLE_LABEL)) {
      continue;
    }
    if (file.type !== DOWNLOADABLE_TYPE) {
      continue;
    }
    const subdir = file.attrs.subdir;
    const basename = file.basename.split("/").pop();
    if (!subdir || !basename) {
      continue;
    }
    entries.push({
      key: [channel, packageName, file.version, subdir, basename],
      total: Math.max(0, file.ndownloads),
    });
  }
  return entries;
}

export class AnacondaCountSource implements CountSource {
  constructor(
    private readonly client: AnacondaApiClient,
    private readonly options: AnacondaCountSourceOptions
  ) {}

  private async packageNames(channel: string): Promise<string[]> {
    return this.options.packageNames
      ? await this.options.packageNames(channel)
      : await retrievePackageNames(this.client, channel);
  }

  async fetch(asOfDate: DateString): Promise<DownloadSnapshot> {
    const snapshot = new Map<string, SnapshotEntry>();
    for (const channel of this.options.channels) {
      const entries = await this.fetchChannel(channel, asOfDate);
      for (const entry of entries) {
        snapshot.set(keyPath(entry.key), entry);
      }
    }
    return snapshot;
  }

  private async fetchChannel(
    channel: string,
    asOfDate: DateString
  ): Promise<SnapshotEntry[]> {
    const startTime = Date.now();
    const packageNames = await this.packageNames(channel);
    const total = packageNames.length;
    const rateLimitDelay = this.options.rateLimitDelay ?? RATE_LIMIT_DELAY;
    console.log(
      `Fetching download counts of ${total} ${channel} packages as of ${asOfDate}...`
    );

    const entries: SnapshotEntry[] = [];
    let processed = 0;
    let failureCount = 0;

    for (const batch of chunk(packageNames, this.options.concurrency)) {
      const results = await Promise.allSettled(
        batch.map(async (packageName, index) => {
          await delay(index * rateLimitDelay); // Stagger requests within batch
          const info = await this.client.packageInfo(channel, packageName);
          return packageDownloadCounts(channel, packageName, info);
        })
      );

      results.forEach((result, index) => {
        const current = processed + index + 1;
        const packageName = batch[index];
        if (result.status === "fulfilled") {
          entries.push(...result.value);
          console.log(
            `[${current}/${total}] ✓ ${channel}::${packageName} (${result.value.length} files)`
          );
        } else {
          failureCount++;
          console.error(
            `[${current}/${total}] ✗ ${channel}::${packageName} omitted:`,
            result.reason instanceof Error
              ? result.reason.message
              : result.reason
          );
        }
      });
      processed += batch.length;
    }

    const duration = ((Date.now() - startTime) / 1000).toFixed(2);
    console.log(
      `\n${channel}: fetched ${entries.length} files in ${duration}s\n` +
        `Successful packages: ${total - failureCount}\n` +
        `Failed packages: ${failureCount}`
    );
    return entries;
  }
}
