import { INestApplication, RequestMethod, ValidationPipe } from '@nestjs/common';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';

/**
 * Global pipes, filters and routing shared by main.ts and the e2e tests,
 * so both serve exactly the same HTTP surface.
 */
export function configureApp(app: INestApplication): INestApplication {
  app.setGlobalPrefix('api', {
    exclude: [{ path: 'health', method: RequestMethod.GET }],
  });

  // ── Global Pipes ──────────────────────────────────────
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // ── Global Filters ────────────────────────────────────
  app.useGlobalFilters(new HttpExceptionFilter());

  return app;
}
