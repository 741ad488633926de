// For the terms of use see COPYRIGHT.md


import {readdir, readFile, stat, Stats} from "fs";


export const fs = {
    readdir: (path: string): Promise<string[]> => new Promise<string[]>(
        (resolve: (result: string[]) => void, reject: (reason: Error) => void): void => {
            readdir(path, settle(resolve, reject));
        }
    ),

    readFile: (path: string): Promise<string> => new Promise<string>(
        (resolve: (result: string) => void, reject: (reason: Error) => void): void => {
            readFile(path, "utf8", settle(resolve, reject));
        }
    ),

    stat: (path: string): Promise<Stats> => new Promise<Stats>(
        (resolve: (result: Stats) => void, reject: (reason: Error) => void): void => {
            stat(path, settle(resolve, reject));
        }
    )
};

function settle<T>(
    resolve: (result: T) => void,
    reject: (reason: Error) => void
): (error: NodeJS.ErrnoException | null, result: T) => void {
    return (error: NodeJS.ErrnoException | null, result: T): void => {
        if (error) {
            reject(error);
        } else {
            resolve(result);
        }
    };
}
