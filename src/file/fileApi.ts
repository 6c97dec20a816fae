export interface FileApi {
    readFileContent(filePath: string): Promise<string>;

    writeFile(filePath: string, data: Uint8Array): Promise<void>;

    exists(filePath: string): Promise<boolean>;

    createDirectory(directoryPath: string): Promise<void>;

    getFileSize(filePath: string): Promise<number>;
}
