import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable, tap } from 'rxjs';
import { resolveException } from '../common/filters/all-exceptions.filter';
import { MetricsService } from './metrics.service';

function routeOf(req: Request): string {
  const route: unknown = req.route;
  if (route && typeof route === 'object' && 'path' in route && typeof route.path === 'string') {
    return route.path;
  }
  return req.path;
}

@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metrics: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const req = http.getRequest<Request>();
    const res = http.getResponse<Response>();
    const start = process.hrtime.bigint();

    const record = (status: number) => {
      const duration = Number(process.hrtime.bigint() - start) / 1e9;
      const labels = { method: req.method, route: routeOf(req), status: String(status) };

      this.metrics.httpRequestsTotal.inc(labels, 1);
      this.metrics.httpRequestDuration.observe(labels, duration);
    };

    return next.handle().pipe(
      tap({
        complete: () => record(res.statusCode),
        error: (error: unknown) => record(resolveException(error).status)
      })
    );
  }
}
