import axios, {AxiosInstance} from 'axios';
import FormData from 'form-data';
import * as fs from 'fs';
import * as path from 'path';
import {UploadClient, UploadResult} from '../types';
import {formatError} from '../utils';

export class HttpUploadClient implements UploadClient {
    private axiosInstance: AxiosInstance;

    constructor(private uploadUrl: string, timeout: number = 120000) {
        this.axiosInstance = axios.create({
            maxContentLength: Infinity,
            maxBodyLength: Infinity,
            timeout,
        });
    }

    async upload(filePath: string): Promise<UploadResult> {
        const form = new FormData();

        // The endpoint reads the image from the "imageFile" field
        const appendOptions: FormData.AppendOptions = {
            filename: path.basename(filePath),
        };
        // A missing file rejects here; only transport outcomes become an UploadResult
        const {size} = await fs.promises.stat(filePath);
        if (size > 0) {
            appendOptions.knownLength = size;
        }

        form.append('imageFile', fs.createReadStream(filePath), appendOptions);

        try {
            await this.axiosInstance.post(this.uploadUrl, form, {
                headers: {
                    ...form.getHeaders()
                },
            });
            return {ok: true};
        } catch (error) {
            if (axios.isAxiosError(error) && error.response) {
                const body = typeof error.response.data === 'string'
                    ? error.response.data
                    : JSON.stringify(error.response.data ?? '');
                return {ok: false, reason: `HTTP ${error.response.status}: ${body}`};
            }
            return {ok: false, reason: formatError(error)};
        }
    }
}
