import { FastifyRequest, FastifyReply } from 'fastify';
import Joi from 'joi';

function formatDetails(error: Joi.ValidationError) {
  return error.details.map(detail => ({
    field: detail.path.join('.'),
    message: detail.message,
  }));
}

export const validate = (schema: Joi.ObjectSchema) => {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const { error, value } = schema.validate(request.body ?? {}, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      return reply.status(400).send({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: formatDetails(error),
        },
      });
    }

    request.body = value;
  };
};

export const validateParams = (schema: Joi.ObjectSchema) => {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const { error, value } = schema.validate(request.params, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      return reply.status(400).send({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Parameter validation failed',
          details: formatDetails(error),
        },
      });
    }

    request.params = value;
  };
};
