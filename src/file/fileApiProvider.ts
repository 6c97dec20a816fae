import { FileApi } from './fileApi';
import { NodeFileApi } from './fileApiImpl';

let current: FileApi = new NodeFileApi();

export function setFileApi(api: FileApi) {
    current = api;
}

export function resetFileApi() {
    current = new NodeFileApi();
}

// Delegating facade so existing imports can keep using `fileApi`
export const fileApi: FileApi = {
    readFileContent: async (filePath: string): Promise<string> => current.readFileContent(filePath),
    writeFile: async (filePath: string, data: Uint8Array): Promise<void> => current.writeFile(filePath, data),
    exists: async (filePath: string): Promise<boolean> => current.exists(filePath),
    createDirectory: async (directoryPath: string): Promise<void> => current.createDirectory(directoryPath),
    getFileSize: async (filePath: string): Promise<number> => current.getFileSize(filePath),
};
