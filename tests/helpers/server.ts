/**
 * In-process HTTP stand-in for the token, RPC and file endpoints
 */
import * as http from 'http';

export interface RecordedRequest {
    method: string;
    url: string;
    headers: http.IncomingHttpHeaders;
    body: string;
}

export interface Reply {
    status: number;
    /** Objects and arrays are sent as JSON, strings as-is */
    body?: unknown;
    headers?: Record<string, string>;
}

export interface TestServer {
    url: string;
    requests: RecordedRequest[];
    close(): Promise<void>;
}

export async function startServer(handler: (req: RecordedRequest) => Reply): Promise<TestServer> {
    const requests: RecordedRequest[] = [];

    const server = http.createServer((req, res) => {
        const chunks: Buffer[] = [];
        req.on('data', (chunk: Buffer) => chunks.push(chunk));
        req.on('end', () => {
            const recorded: RecordedRequest = {
                method: req.method ?? '',
                url: req.url ?? '',
                headers: req.headers,
                body: Buffer.concat(chunks).toString('utf8'),
            };
            requests.push(recorded);

            const reply = handler(recorded);
            const isText = typeof reply.body === 'string' || reply.body === undefined;
            const payload = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body ?? '');
            res.writeHead(reply.status, {
                ...(isText ? {} : { 'Content-Type': 'application/json' }),
                ...reply.headers,
            });
            res.end(reply.body === undefined ? '' : payload);
        });
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') {
        throw new Error('Test server has no port');
    }

    return {
        url: `http://127.0.0.1:${address.port}`,
        requests,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.closeAllConnections();
                server.close((err) => (err ? reject(err) : resolve()));
            }),
    };
}

/**
 * URL of a port that nothing listens on
 */
export async function unreachableUrl(): Promise<string> {
    const server = await startServer(() => ({ status: 200 }));
    await server.close();
    return server.url;
}
