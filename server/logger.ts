import type { NextFunction, Request, Response } from 'express';

export function log(message: string, source = 'express'): void {
  const formattedTime = new Date().toLocaleTimeString('en-US', {
    hour: 'numeric',
    minute: '2-digit',
    second: '2-digit',
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

/** Log each request under `prefix` as `METHOD path status in Nms`. */
export function requestLogger(prefix: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const path = req.path;

    res.on('finish', () => {
      if (!path.startsWith(prefix)) return;
      const duration = Date.now() - start;
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      const total = res.getHeader('X-Total-Count');
      if (total !== undefined) {
        logLine += ` :: ${String(total)} records`;
      }

      if (logLine.length > 80) {
        logLine = logLine.slice(0, 79) + '…';
      }

      log(logLine);
    });

    next();
  };
}
