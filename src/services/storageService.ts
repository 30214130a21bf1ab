import { promises as fs } from "node:fs";
import path from "node:path";
import {
  S3Client,
  GetObjectCommand,
  ListObjectsV2Command,
  type ListObjectsV2CommandOutput,
} from "@aws-sdk/client-s3";
import { bucketName, getS3Client } from "../config.js";
import { errorMessage } from "../errors.js";
import type { DocumentListing, ParentGroupListing } from "../types/document.js";

export interface DocumentSource {
  readonly kind: string;
  listGroups(rootHandle: string): Promise<ParentGroupListing[]>;
  // PDF documents only
  listDocuments(group: ParentGroupListing): Promise<DocumentListing[]>;
  download(documentHandle: string, destination: string, signal?: AbortSignal): Promise<void>;
}

const isPdf = (name: string): boolean => name.toLowerCase().endsWith(".pdf");

const byName = <T extends { name?: string; id?: string }>(a: T, b: T): number =>
  (a.name ?? a.id ?? "").localeCompare(b.name ?? b.id ?? "");

/**
 * Groups are the first-level prefixes under the root prefix; documents are
 * the PDF keys below a group prefix.
 */
export class S3DocumentSource implements DocumentSource {
  readonly kind = "s3";
  private s3Client: S3Client;

  constructor(private readonly bucket: string = bucketName, client?: S3Client) {
    this.s3Client = client ?? getS3Client();
  }

  async listGroups(rootHandle: string): Promise<ParentGroupListing[]> {
    const prefix = rootHandle === "" || rootHandle.endsWith("/") ? rootHandle : `${rootHandle}/`;
    const groups: ParentGroupListing[] = [];

    for await (const page of this.listPages(prefix, "/")) {
      for (const common of page.CommonPrefixes ?? []) {
        if (!common.Prefix) continue;
        const id = common.Prefix.slice(prefix.length).replace(/\/$/, "");
        if (id) groups.push({ id, handle: common.Prefix });
      }
    }

    console.log(`📂 [STORAGE_LIST_GROUPS] bucket=${this.bucket} prefix=${prefix} groups=${groups.length}`);
    return groups.sort(byName);
  }

  async listDocuments(group: ParentGroupListing): Promise<DocumentListing[]> {
    const documents: DocumentListing[] = [];

    for await (const page of this.listPages(group.handle)) {
      for (const object of page.Contents ?? []) {
        if (!object.Key || !isPdf(object.Key)) continue;
        documents.push({
          handle: object.Key,
          name: path.posix.basename(object.Key),
          size: object.Size,
        });
      }
    }

    return documents.sort(byName);
  }

  async download(documentHandle: string, destination: string, signal?: AbortSignal): Promise<void> {
    const command = new GetObjectCommand({
      Bucket: this.bucket,
      Key: documentHandle,
    });

    try {
      const response = await this.s3Client.send(command, { abortSignal: signal });

      if (!response.Body) {
        throw new Error("No file content received");
      }

      const buffer = Buffer.from(await response.Body.transformToByteArray());
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.writeFile(destination, buffer);

      console.log(`✅ [STORAGE_DOWNLOAD] key=${documentHandle} size=${buffer.length}`);
    } catch (error) {
      console.error(
        `❌ [STORAGE_DOWNLOAD_FAILED] key=${documentHandle} error=${errorMessage(error)}`
      );
      throw new Error(`Failed to download file: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async *listPages(
    prefix: string,
    delimiter?: string
  ): AsyncGenerator<ListObjectsV2CommandOutput> {
    let continuationToken: string | undefined;
    do {
      const page = await this.s3Client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          Delimiter: delimiter,
          ContinuationToken: continuationToken,
        })
      );
      yield page;
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
  }
}

// Groups are the sub-directories of the root; documents are the PDFs below each.
export class LocalDocumentSource implements DocumentSource {
  readonly kind = "local";

  async listGroups(rootHandle: string): Promise<ParentGroupListing[]> {
    const entries = await fs.readdir(rootHandle, { withFileTypes: true });
    const groups = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => ({ id: entry.name, handle: path.join(rootHandle, entry.name) }))
      .sort(byName);

    console.log(`📂 [STORAGE_LIST_GROUPS] root=${rootHandle} groups=${groups.length}`);
    return groups;
  }

  async listDocuments(group: ParentGroupListing): Promise<DocumentListing[]> {
    const documents: DocumentListing[] = [];
    await this.walk(group.handle, documents);
    return documents.sort((a, b) => a.handle.localeCompare(b.handle));
  }

  async download(documentHandle: string, destination: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.copyFile(documentHandle, destination);
  }

  private async walk(directory: string, documents: DocumentListing[]): Promise<void> {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        await this.walk(fullPath, documents);
      } else if (entry.isFile() && isPdf(entry.name)) {
        const stats = await fs.stat(fullPath);
        documents.push({ handle: fullPath, name: entry.name, size: stats.size });
      }
    }
  }
}
