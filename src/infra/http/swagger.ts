import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Account Service API',
      version: '1.0.0',
      description: 'User registration, bearer-token authentication and profile lookup',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'INVALID_CREDENTIALS',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Incorrect email or password',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
        UserProfile: {
          type: 'object',
          required: ['id', 'email', 'is_active', 'is_admin', 'created_at'],
          properties: {
            id: { type: 'string', format: 'uuid' },
            email: { type: 'string', format: 'email' },
            full_name: { type: 'string', nullable: true },
            is_active: { type: 'boolean' },
            is_admin: { type: 'boolean' },
            last_login: { type: 'string', format: 'date-time', nullable: true },
            created_at: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Registration and login' },
      { name: 'Users', description: 'Profiles and account administration' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export function buildOpenApiSpec(): object {
  return swaggerJsdoc(options);
}
