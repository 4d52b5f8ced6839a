import path from "path";
import fs from "fs/promises";
import { createHash } from "crypto";
import AdmZip from "adm-zip";
import { ErrorRouteLogger } from "./loggerDecorator";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";

export interface StoredObject {
    relativePath: string;
    sha256: string;
}

export function sha256Hex(bytes: Buffer): string {
    return createHash("sha256").update(bytes).digest("hex");
}

export function datasetDirectoryName(datasetId: number): string {
    return `dataset_${datasetId}`;
}

// Blob storage rooted at a single directory; objects live under dataset_<id>/<file name>.
export class FileStorage {
    private readonly root: string;
    private readonly errorLogger = new ErrorRouteLogger();
    private readonly errorManager = ErrorManager.getInstance();

    constructor(root: string) {
        this.root = path.resolve(root);
    }

    async init(): Promise<void> {
        await fs.mkdir(this.root, { recursive: true });
    }

    getRoot(): string {
        return this.root;
    }

    // Writes bytes under the dataset directory and returns the stored relative path.
    async store(datasetId: number, originalName: string, bytes: Buffer, sha256: string = sha256Hex(bytes)): Promise<StoredObject> {
        const directoryName = datasetDirectoryName(datasetId);
        const directory = path.join(this.root, directoryName);
        await fs.mkdir(directory, { recursive: true });

        let fileName = path.basename(originalName);
        if (await this.pathExists(path.join(directory, fileName))) {
            fileName = `${sha256.slice(0, 12)}_${fileName}`;
        }

        await fs.writeFile(path.join(directory, fileName), bytes);
        return { relativePath: path.posix.join(directoryName, fileName), sha256 };
    }

    // Maps a stored relative path to an absolute one, refusing paths that leave the root.
    resolve(relativePath: string): string {
        const absolute = path.resolve(this.root, relativePath);
        if (absolute !== this.root && !absolute.startsWith(this.root + path.sep)) {
            throw this.errorManager.createError(ErrorStatus.storageFault, "Stored path escapes the storage root", "storage_missing");
        }
        return absolute;
    }

    async exists(relativePath: string): Promise<boolean> {
        return this.pathExists(this.resolve(relativePath));
    }

    async datasetDirExists(datasetId: number): Promise<boolean> {
        try {
            const stat = await fs.stat(path.join(this.root, datasetDirectoryName(datasetId)));
            return stat.isDirectory();
        } catch {
            return false;
        }
    }

    // Zips the dataset directory in memory, entries relative to that directory; no directory gives an empty zip.
    async archiveDataset(datasetId: number): Promise<Buffer> {
        const zip = new AdmZip();
        if (await this.datasetDirExists(datasetId)) {
            zip.addLocalFolder(path.join(this.root, datasetDirectoryName(datasetId)));
        }
        return zip.toBuffer();
    }

    async removeDataset(datasetId: number): Promise<void> {
        await fs.rm(path.join(this.root, datasetDirectoryName(datasetId)), { recursive: true, force: true });
    }

    async removeFile(relativePath: string): Promise<void> {
        try {
            await fs.unlink(this.resolve(relativePath));
        } catch (error) {
            if (this.isMissing(error)) {
                return;
            }
            const message = error instanceof Error ? error.message : "Unknown error";
            this.errorLogger.logStorageError("remove_file", relativePath, message);
            throw error;
        }
    }

    private async pathExists(absolutePath: string): Promise<boolean> {
        try {
            await fs.access(absolutePath);
            return true;
        } catch {
            return false;
        }
    }

    private isMissing(error: unknown): boolean {
        return error instanceof Error && "code" in error && error.code === "ENOENT";
    }
}
