import express, {
  type ErrorRequestHandler,
  type NextFunction,
  type Request,
  type Response,
} from 'express';
import type { Server } from 'http';
import { promises as fs } from 'fs';
import * as path from 'path';
import { errorMessage, escapeHtml } from '@mdsite/types';

export interface StaticServerOptions {
  /** 配信するディレクトリ（ビルドの出力先） */
  rootDir: string;
  host: string;
  port: number;
  /** ポート使用中の場合に試す最大ポート数（指定ポートを含む） */
  maxPortAttempts: number;
}

const NOT_FOUND_HTML = '<h1>Page Not Found</h1>';

/** ファイルが存在しないものとして扱うエラーコード */
const MISSING_FILE_CODES = new Set(['ENOENT', 'ENOTDIR', 'ENAMETOOLONG', 'ERR_INVALID_ARG_VALUE']);

/**
 * リクエストパスをデコード
 * @returns 不正なエンコーディング・NUL文字を含む場合はnull
 */
function decodeRequestPath(requestPath: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(requestPath);
  } catch (error) {
    if (error instanceof URIError) {
      return null;
    }
    throw error;
  }
  return decoded.includes('\0') ? null : decoded;
}

/**
 * 出力ディレクトリを配信するHTTPサーバ
 * リクエストごとにディスクから読み込むため、再ビルド後の内容がそのまま返る
 */
export class StaticServer {
  private app: express.Application;
  private server: Server | null = null;
  private rootDir: string;

  constructor(private options: StaticServerOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /** 待ち受け中のポート（起動前はnull） */
  get port(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  /**
   * ミドルウェア設定
   */
  private setupMiddleware(): void {
    // リクエストログ
    this.app.use((req, _res, next) => {
      console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
      next();
    });
  }

  /**
   * ルート設定
   */
  private setupRoutes(): void {
    // パスのデコードはハンドラ内で行う（ルートパラメータを使わない）
    this.app.use((req, res, next) => {
      if (req.method !== 'GET' && req.method !== 'HEAD') {
        next();
        return;
      }
      this.handleFileRequest(req, res).catch(next);
    });

    // 404ハンドラ
    this.app.use((_req, res) => {
      res.status(404).type('html').send(NOT_FOUND_HTML);
    });

    const errorHandler: ErrorRequestHandler = (
      error: unknown,
      req: Request,
      res: Response,
      _next: NextFunction
    ) => {
      const message = errorMessage(error);
      console.error(`[StaticServer] Error handling ${req.method} ${req.path}: ${message}`);
      res.status(500).type('html').send(`<h1>Error</h1><p>${escapeHtml(message)}</p>`);
    };
    this.app.use(errorHandler);
  }

  /**
   * パスに対応するファイルを返す
   */
  private async handleFileRequest(req: Request, res: Response): Promise<void> {
    const requestPath = decodeRequestPath(req.path);
    if (requestPath === null) {
      res.status(404).type('html').send(NOT_FOUND_HTML);
      return;
    }
    const filePath = path.resolve(this.rootDir, `.${requestPath}`);

    // ルート外を指すパスは存在しないものとして扱う
    const relative = path.relative(this.rootDir, filePath);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      res.status(404).type('html').send(NOT_FOUND_HTML);
      return;
    }

    let isFile = false;
    try {
      isFile = (await fs.stat(filePath)).isFile();
    } catch (error) {
      if (!MISSING_FILE_CODES.has((error as NodeJS.ErrnoException).code ?? '')) {
        throw error;
      }
    }

    if (!isFile) {
      res.status(404).type('html').send(NOT_FOUND_HTML);
      return;
    }

    const content = await fs.readFile(filePath, 'utf-8');
    res.status(200).type('html').send(content);
  }

  /**
   * サーバ起動
   * ポートが使用中なら次のポートを試す
   * @returns 待ち受けたポート
   */
  async start(): Promise<number> {
    if (this.server) {
      throw new Error('StaticServer is already started');
    }

    const { host, port, maxPortAttempts } = this.options;

    for (let attempt = 0; attempt < maxPortAttempts; attempt++) {
      const candidate = port === 0 ? 0 : port + attempt;
      try {
        this.server = await this.listen(host, candidate);
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'EADDRINUSE') {
          console.warn(`[StaticServer] Port ${candidate} is in use, trying ${candidate + 1}`);
          continue;
        }
        throw error;
      }

      const bound = this.port ?? candidate;
      console.log(`[StaticServer] Serving ${this.rootDir} at http://${host}:${bound}`);
      return bound;
    }

    throw new Error(
      `No available port in ${port}-${port + maxPortAttempts - 1} on ${host}`
    );
  }

  private listen(host: string, port: number): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host);
      const onError = (error: Error) => {
        server.off('listening', onListening);
        reject(error);
      };
      const onListening = () => {
        server.off('error', onError);
        resolve(server);
      };
      server.once('error', onError);
      server.once('listening', onListening);
    });
  }

  /**
   * サーバ停止
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
        } else {
          console.log('[StaticServer] Server stopped');
          resolve();
        }
      });
    });
  }
}
