import { z } from "zod";

export const anacondaFileSchema = z
  .object({
    basename: z.string(),
    version: z.string(),
    type: z.string(),
    labels: z.array(z.string()),
    ndownloads: z.number(),
    attrs: z.object({ subdir: z.string().optional() }).passthrough(),
  })
  .passthrough();

export type AnacondaFile = z.infer<typeof anacondaFileSchema>;

// https://api.anaconda.org/package/<channel>/<package>
export const anacondaPackageSchema = z
  .object({
    name: z.string().optional(),
    files: z.array(anacondaFileSchema),
  })
  .passthrough();

export type AnacondaPackage = z.infer<typeof anacondaPackageSchema>;

const repodataEntriesSchema = z.record(
  z.object({ name: z.string() }).passthrough()
);

// https://conda.anaconda.org/<channel>/<subdir>/repodata.json
export const repodataSchema = z
  .object({
    packages: repodataEntriesSchema.default({}),
    "packages.conda": repodataEntriesSchema.default({}),
  })
  .passthrough();

export type Repodata = z.infer<typeof repodataSchema>;
