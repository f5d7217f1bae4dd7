import { randomUUID } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import { extname, join } from "node:path";

import { badRequest } from "@/lib/errors";

export type AttachmentDescriptor = {
  filename: string;
  url: string;
  content_type: string;
};

export type Bucket = "attachments" | "avatars";

export type IncomingBlob = {
  filename: string;
  contents: Uint8Array;
  contentType: string;
};

const bucketDirs: Record<Bucket, string> = {
  attachments: "",
  avatars: "avatars",
};

/** Stores uploaded files on local disk under random names. */
export class AttachmentStore {
  constructor(
    readonly root: string,
    readonly urlPrefix = "/uploads"
  ) {}

  async saveBlob(
    blob: IncomingBlob,
    bucket: Bucket = "attachments"
  ): Promise<AttachmentDescriptor> {
    const fallbackName = bucket === "avatars" ? "avatar" : "file";
    const filename = blob.filename || fallbackName;

    let extension = extname(filename);
    if (!extension && bucket === "avatars") {
      extension = ".png";
    }

    const storedName = `${randomUUID().replaceAll("-", "")}${extension}`;
    const subdir = bucketDirs[bucket];
    const dir = join(this.root, subdir);

    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, storedName), blob.contents);

    const urlPath = subdir ? `${subdir}/${storedName}` : storedName;
    return {
      filename,
      url: `${this.urlPrefix}/${urlPath}`,
      content_type: blob.contentType,
    };
  }

  async saveAvatar(blob: IncomingBlob): Promise<AttachmentDescriptor> {
    if (!blob.contentType.startsWith("image/")) {
      throw badRequest("File must be an image");
    }
    return this.saveBlob(blob, "avatars");
  }
}

export async function readUpload(file: File): Promise<IncomingBlob> {
  return {
    filename: file.name,
    contents: new Uint8Array(await file.arrayBuffer()),
    contentType: file.type,
  };
}
