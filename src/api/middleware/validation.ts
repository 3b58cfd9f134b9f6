import { NextFunction, Request, Response } from 'express';
import Joi from 'joi';
import { ValidationError } from '../../utils/errors';

export interface ValidationDetail {
    field: string;
    message: string;
    type: string;
}

/**
 * Validates and converts `data` against the schema, throwing a ValidationError
 * that lists every failing field.
 */
export function validateInput<T>(schema: Joi.ObjectSchema<T>, data: unknown, target: string = 'body'): T {
    const result = schema.validate(data, {
        abortEarly: false,
        stripUnknown: true
    });

    if (result.error !== undefined) {
        const errors: ValidationDetail[] = result.error.details.map(detail => ({
            field: detail.path.join('.'),
            message: detail.message,
            type: detail.type
        }));

        throw new ValidationError(`Request ${target} validation failed`, errors[0]?.field, undefined, { errors });
    }

    return result.value;
}

/**
 * Joi validation middleware factory. Replaces the request body with the
 * validated (trimmed, converted) value.
 */
export const validateWithJoi = <T>(schema: Joi.ObjectSchema<T>) => {
    return (req: Request, _res: Response, next: NextFunction): void => {
        try {
            req.body = validateInput(schema, req.body);
            next();
        } catch (error) {
            next(error);
        }
    };
};

export const listDocumentsQuerySchema = (maxTop: number) => Joi.object<{ top?: number }>({
    top: Joi.number().integer().min(1).max(maxTop).optional()
});

export const uploadQuerySchema = Joi.object<{ filename: string }>({
    filename: Joi.string().trim().min(1).max(255).required()
});
