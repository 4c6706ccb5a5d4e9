import { Module } from '@nestjs/common';
import { APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { ScheduleModule } from '@nestjs/schedule';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { LoggerModule } from 'nestjs-pino';
import { config } from './config';
import { SupabaseModule } from './supabase/supabase.module';
import { MetricsModule } from './metrics/metrics.module';
import { MetricsInterceptor } from './metrics/metrics.interceptor';
import { HealthModule } from './health/health.module';
import { CalendarModule } from './calendar/calendar.module';
import { BlockOutsModule } from './block-outs/block-outs.module';
import { GigsModule } from './gigs/gigs.module';
import { RehearsalsModule } from './rehearsals/rehearsals.module';

@Module({
  imports: [
    LoggerModule.forRoot({
      pinoHttp: {
        level: config.isProd ? 'info' : 'debug',
        redact: {
          paths: ['req.headers.authorization', 'req.headers.cookie', 'res.headers["set-cookie"]'],
          remove: true
        },
        customProps: () => ({ service: 'gigboard-api' })
      }
    }),
    ThrottlerModule.forRoot([
      {
        ttl: config.limits.rateLimitTtlSeconds * 1000,
        limit: config.limits.rateLimitPerMinute
      }
    ]),
    ScheduleModule.forRoot(),
    SupabaseModule,
    MetricsModule,
    HealthModule,
    CalendarModule,
    BlockOutsModule,
    GigsModule,
    RehearsalsModule
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: MetricsInterceptor
    }
  ]
})
export class AppModule {}
