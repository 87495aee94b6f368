import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';

/**
 * Raw OpenAPI document at /openapi.json and the interactive explorer at /docs.
 */
export function createDocsRoutes(openApiDocument: object) {
  const router = Router();

  router.get('/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });

  router.use(
    '/docs',
    swaggerUi.serve,
    swaggerUi.setup(openApiDocument, {
      customSiteTitle: 'Account Service API',
      swaggerOptions: { persistAuthorization: true },
    })
  );

  return router;
}
