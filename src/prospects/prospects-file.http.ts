import {
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import {
  InvalidProspectsFileError,
  ProspectsFileNotFoundError,
} from './prospect.errors';

/** Maps failures of `ProspectExportService.load` to HTTP errors. */
export function rethrowLoadError(error: unknown): never {
  if (error instanceof ProspectsFileNotFoundError) {
    throw new NotFoundException(error.message);
  }
  if (error instanceof InvalidProspectsFileError) {
    throw new UnprocessableEntityException(error.message);
  }
  throw error;
}
