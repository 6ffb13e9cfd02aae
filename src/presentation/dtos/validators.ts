import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isChangedFileShape(value: unknown): boolean {
  return (
    isPlainObject(value) &&
    typeof value.content === 'string' &&
    (value.diff === undefined || value.diff === null || typeof value.diff === 'string')
  );
}

/**
 * Non-empty object whose keys are file paths and whose values are file contents.
 */
export function IsFileContentMap(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isFileContentMap',
      validator: {
        validate: (value: unknown): boolean =>
          isPlainObject(value) &&
          Object.keys(value).length > 0 &&
          Object.values(value).every(content => typeof content === 'string'),
        defaultMessage: buildMessage(
          eachPrefix => `${eachPrefix}$property must map file paths to file contents`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

/**
 * Non-empty object whose values are `{ content, diff? }`.
 */
export function IsChangedFileMap(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isChangedFileMap',
      validator: {
        validate: (value: unknown): boolean =>
          isPlainObject(value) && Object.keys(value).length > 0 && Object.values(value).every(isChangedFileShape),
        defaultMessage: buildMessage(
          eachPrefix => `${eachPrefix}$property must map file paths to { content, diff? } objects`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
