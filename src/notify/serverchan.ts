import type { DigestConfig, Notifier, NotifyPayload } from '../types/index.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

/**
 * WeChat push through ServerChan (https://sct.ftqq.com).
 */
export class ServerChanNotifier implements Notifier {
    readonly name = 'serverchan';
    private readonly logger = getLogger();

    constructor(
        private readonly sendKey: string,
        private readonly httpClient: HttpClient = getHttpClient()
    ) {}

    async notify(payload: NotifyPayload): Promise<void> {
        const { title, body } = buildMessage(payload);
        const form = new URLSearchParams({ title, desp: body });

        try {
            await this.httpClient.post(`https://sctapi.ftqq.com/${this.sendKey}.send`, form.toString(), {
                source: 'serverchan',
                timeout: 10000,
                headers: { 'Content-Type': 'application/x-www-form-urlencoded;charset=utf-8' },
            });
            this.logger.info({ date: payload.date, count: payload.count }, 'Notification sent');
        } catch (error) {
            if (!(error instanceof HttpError)) throw error;
            this.logger.warn({ date: payload.date, status: error.status, error: error.message }, 'Notification failed');
        }
    }
}

export function buildMessage(payload: NotifyPayload): { title: string; body: string } {
    const lines =
        payload.count > 0
            ? [`今日共 ${payload.count} 篇符合筛选条件的论文。`]
            : ['今天没有符合筛选条件的论文。'];

    if (payload.siteUrl) {
        lines.push('', `点击查看：${payload.siteUrl}`);
    }

    const title = payload.count > 0
        ? `ArXiv Daily Digest ${payload.date} 已更新 (${payload.count} 篇)`
        : `ArXiv Daily Digest ${payload.date} 暂无新论文`;

    return { title, body: lines.join('\n') };
}

/**
 * Public site URL: configured base URL, else the GitHub Pages URL of the running repository.
 */
export function resolveSiteUrl(
    config: Pick<Readonly<DigestConfig>, 'site'>,
    env: NodeJS.ProcessEnv = process.env
): string | null {
    if (config.site.baseUrl) {
        return `${config.site.baseUrl.replace(/\/+$/, '')}/`;
    }

    const repo = env['GITHUB_REPOSITORY'] ?? '';
    const slash = repo.indexOf('/');
    if (slash > 0 && slash < repo.length - 1) {
        return `https://${repo.slice(0, slash)}.github.io/${repo.slice(slash + 1)}/`;
    }

    return null;
}
