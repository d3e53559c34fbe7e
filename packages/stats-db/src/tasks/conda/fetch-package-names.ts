import { AnacondaApiClient } from "../../conda-client";

export const SUBDIRS = [
  "noarch",
  "linux-64",
  "linux-aarch64",
  "linux-ppc64le",
  "osx-64",
  "osx-arm64",
  "win-64",
] as const;

async function extractPackageNames(
  client: AnacondaApiClient,
  channel: string,
  subdir: string
): Promise<Set<string>> {
  const repodata = await client.repodata(channel, subdir);
  const names = new Set<string>();
  for (const entries of [repodata.packages, repodata["packages.conda"]]) {
    for (const entry of Object.values(entries)) {
      names.add(entry.name);
    }
  }
  return names;
}

/**
 * Sorted names of every package published to `channel` on any subdir.
 */
export async function retrievePackageNames(
  client: AnacondaApiClient,
  channel: string,
  subdirs: readonly string[] = SUBDIRS
): Promise<string[]> {
  const packageNames = new Set<string>();
  const perSubdir = await Promise.all(
    subdirs.map((subdir) => extractPackageNames(client, channel, subdir))
  );
  for (const names of perSubdir) {
    names.forEach((name) => packageNames.add(name));
  }
  return Array.from(packageNames).sort();
}

export async function printPackageNames(
  client: AnacondaApiClient,
  channels: readonly string[]
): Promise<void> {
  for (const channel of channels) {
    const packageNames = await retrievePackageNames(client, channel);
    console.log(packageNames.map((name) => `${channel}::${name}`).join("\n"));
  }
}
