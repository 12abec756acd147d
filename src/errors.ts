export class NoTablesFoundError extends Error {
  constructor(message: string = 'No valid stats tables found.') {
    super(message);
    this.name = 'NoTablesFoundError';
  }
}

/**
 * Raised when observed table categories have no priority rank in the settings file.
 * Ranks have to be saved (and reviewed) before variables can be mapped.
 */
export class UnrankedCategoryError extends Error {
  constructor(public readonly categories: string[]) {
    super(`${categories.join(', ')} have no assigned ranks. Update the tables section of the settings file.`);
    this.name = 'UnrankedCategoryError';
  }
}

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(`HTTP ${statusCode}: ${url}`);
    this.name = 'HttpError';
  }
}
