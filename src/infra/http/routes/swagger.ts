import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { swaggerSpec } from '../swagger.js';

/**
 * Swagger UI at /docs and the raw OpenAPI document at /docs.json.
 */
export function createSwaggerRoutes(spec: object = swaggerSpec) {
  const router = Router();

  router.get('/docs.json', (_req, res) => {
    res.json(spec);
  });
  router.use('/docs', swaggerUi.serve);
  router.get(
    '/docs',
    swaggerUi.setup(spec, {
      customSiteTitle: 'Insight Auth API',
      customCss: '.swagger-ui .topbar { display: none }',
    })
  );

  return router;
}
