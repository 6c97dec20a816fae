import { access, mkdir, readFile, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { FileApi } from './fileApi';

export class NodeFileApi implements FileApi {

    async readFileContent(filePath: string): Promise<string> {
        return readFile(filePath, 'utf-8');
    }

    async writeFile(filePath: string, data: Uint8Array): Promise<void> {
        await mkdir(dirname(filePath), { recursive: true });
        await writeFile(filePath, data);
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await access(filePath);
            return true;
        } catch {
            return false;
        }
    }

    async createDirectory(directoryPath: string): Promise<void> {
        await mkdir(directoryPath, { recursive: true });
    }

    async getFileSize(filePath: string): Promise<number> {
        const stats = await stat(filePath);
        return stats.size;
    }
}
