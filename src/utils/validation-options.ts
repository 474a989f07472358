import {
  BadRequestException,
  HttpStatus,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';

export interface ValidationErrorTree {
  [property: string]: string | ValidationErrorTree;
}

// Nested DTOs keep their shape; leaf constraints collapse into one string
export function toErrorTree(errors: ValidationError[]): ValidationErrorTree {
  const tree: ValidationErrorTree = {};
  for (const error of errors) {
    const children = error.children ?? [];
    tree[error.property] =
      children.length > 0
        ? toErrorTree(children)
        : Object.values(error.constraints ?? {}).join(', ');
  }
  return tree;
}

const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  errorHttpStatusCode: HttpStatus.BAD_REQUEST,
  exceptionFactory: (errors: ValidationError[]) =>
    new BadRequestException({
      status: HttpStatus.BAD_REQUEST,
      message: 'Request validation failed',
      errors: toErrorTree(errors),
    }),
};

export default validationOptions;
