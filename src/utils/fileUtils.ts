import fs from 'fs/promises';
import path from 'path';
import {SnapshotError} from './errors';

export const ensureDirectoryExists = async (dirPath: string): Promise<void> => {
    await fs.mkdir(dirPath, {recursive: true});
};

/**
 * Write a document as pretty-printed JSON (4-space indent), creating the
 * parent directory when needed.
 */
export const writeJsonFile = async (filePath: string, data: unknown): Promise<void> => {
    try {
        await ensureDirectoryExists(path.dirname(filePath));
        await fs.writeFile(filePath, JSON.stringify(data, null, 4), 'utf-8');
    } catch (error) {
        throw new SnapshotError(`Failed to write file: ${filePath}`, {cause: error});
    }
};

export const readJsonFile = async (filePath: string): Promise<unknown> => {
    let data: string;
    try {
        data = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        throw new SnapshotError(`Failed to read file: ${filePath}`, {cause: error});
    }
    try {
        return JSON.parse(data);
    } catch (error) {
        throw new SnapshotError(`File is not valid JSON: ${filePath}`, {cause: error});
    }
};

export const writeTextFile = async (filePath: string, text: string): Promise<void> => {
    await ensureDirectoryExists(path.dirname(filePath));
    await fs.writeFile(filePath, text, 'utf-8');
};
