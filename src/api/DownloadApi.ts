/**
 * Download API
 * Daily build listing and download links
 */

import { z } from 'zod';
import type { HttpClient, RpcResult, RpcValue } from '../client/HttpClient.js';

export const PRODUCTS = ['houdini', 'houdini-qt4'] as const;
export const PLATFORMS = ['win64', 'macos', 'linux'] as const;

export type Product = (typeof PRODUCTS)[number];
export type Platform = (typeof PLATFORMS)[number];

const DailyBuildSchema = z
    .object({
        product: z.string().optional(),
        version: z.string().optional(),
        build: z.union([z.string(), z.number()]).optional(),
        platform: z.string().optional(),
        date: z.string().optional(),
        release: z.string().optional(),
        status: z.string().optional(),
    })
    .passthrough();

const BuildDownloadSchema = z
    .object({
        download_url: z.string().url(),
        filename: z.string().min(1),
        hash: z.string().optional(),
        size: z.number().optional(),
        date: z.string().optional(),
    })
    .passthrough();

export type DailyBuild = z.infer<typeof DailyBuildSchema>;
export type BuildDownload = z.infer<typeof BuildDownloadSchema>;

export class DownloadApi {
    constructor(private readonly http: HttpClient) {}

    /**
     * List daily builds. Unset filters are sent as null, in position.
     */
    async getDailyBuildsList(
        product: string,
        version?: string,
        platform?: string,
        onlyProduction?: boolean
    ): Promise<RpcResult<DailyBuild[]>> {
        const args: RpcValue[] = [product, version ?? null, platform ?? null, onlyProduction ?? null];
        const result = await this.http.call('download.get_daily_builds_list', args);
        return validate(result, z.array(DailyBuildSchema));
    }

    /**
     * Resolve the download link for one build. `build` is a build
     * number or "production" for the latest production build.
     */
    async getDailyBuildDownload(
        product: string,
        version: string,
        build: string,
        platform: string
    ): Promise<RpcResult<BuildDownload>> {
        const result = await this.http.call('download.get_daily_build_download', [product, version, build, platform]);
        return validate(result, BuildDownloadSchema);
    }
}

function validate<T>(result: RpcResult, schema: z.ZodType<T, z.ZodTypeDef, unknown>): RpcResult<T> {
    if (!result.ok) return result;

    const parsed = schema.safeParse(result.data);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        return { ok: false, kind: 'malformed', message: `Unexpected response${where}: ${issue?.message ?? 'invalid'}` };
    }
    return { ok: true, data: parsed.data };
}
