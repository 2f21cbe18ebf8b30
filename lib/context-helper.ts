export class ContextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContextError';
  }
}

/**/

export enum PriceTier {
  PriceClass100 = 'PriceClass_100',
  PriceClass200 = 'PriceClass_200',
  PriceClassAll = 'PriceClass_All',
}

export interface SiteProps {
  workload: string,
  environment: string,
  deployer: string,
  repository: string,
  branch: string,
  connectionArn: string,
  priceTier: PriceTier,
  buildImage: string,
}

export const SITE_DEFAULTS = {
  environment: 'dev',
  deployer: 'CDK',
  branch: 'main',
  priceTier: PriceTier.PriceClass100,
  buildImage: 'aws/codebuild/standard:7.0',
} as const;

const NAME_PATTERN = /^[a-z0-9-]+$/;
const REPOSITORY_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;
const CONNECTION_ARN_PATTERN = /^arn:aws[a-z-]*:(codestar-connections|codeconnections):[a-z0-9-]+:\d{12}:connection\/[A-Za-z0-9-]+$/;
const NO_WHITESPACE_PATTERN = /^\S+$/;

function isRecord (value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPriceTier (value: string): value is PriceTier {
  return Object.values(PriceTier).some(tier => tier === value);
}

class ContextReader {
  readonly problems: string[] = [];

  constructor(private readonly context: Record<string, unknown>) {}

  read(key: string, fallback?: string): string {
    const value = this.context[key] ?? fallback;
    if (value === undefined || value === '') {
      this.problems.push(`${key} is required.`);
      return '';
    }
    if (typeof value !== 'string') {
      this.problems.push(`${key} must be a string.`);
      return '';
    }
    return value;
  }

  check(key: string, value: string, pattern: RegExp, description: string) {
    if (value && !pattern.test(value)) {
      this.problems.push(`${key} "${value}" ${description}`);
    }
  }

}

/**
 * Validates the site context and fills in defaults. Every problem found is
 * reported in a single ContextError.
 */
export function parseSiteContext (siteContext: unknown): SiteProps {
  if (!isRecord(siteContext)) {
    throw new ContextError('Missing site context.');
  }
  const reader = new ContextReader(siteContext);
  const workload = reader.read('workload');
  reader.check('workload', workload, NAME_PATTERN, 'may only contain lowercase alphanumerics and hyphens.');
  const environment = reader.read('environment', SITE_DEFAULTS.environment);
  reader.check('environment', environment, NAME_PATTERN, 'may only contain lowercase alphanumerics and hyphens.');
  const deployer = reader.read('deployer', SITE_DEFAULTS.deployer);
  const repository = reader.read('repository');
  reader.check('repository', repository, REPOSITORY_PATTERN, 'must have the form owner/repo.');
  const branch = reader.read('branch', SITE_DEFAULTS.branch);
  reader.check('branch', branch, NO_WHITESPACE_PATTERN, 'must not contain whitespace.');
  const connectionArn = reader.read('connectionArn');
  reader.check('connectionArn', connectionArn, CONNECTION_ARN_PATTERN, 'is not a connection ARN.');
  const priceClass = reader.read('priceClass', SITE_DEFAULTS.priceTier);
  const buildImage = reader.read('buildImage', SITE_DEFAULTS.buildImage);
  reader.check('buildImage', buildImage, NO_WHITESPACE_PATTERN, 'must not contain whitespace.');
  let priceTier: PriceTier = SITE_DEFAULTS.priceTier;
  if (isPriceTier(priceClass)) {
    priceTier = priceClass;
  } else if (priceClass) {
    reader.problems.push(`priceClass "${priceClass}" must be one of ${Object.values(PriceTier).join(', ')}.`);
  }
  if (reader.problems.length > 0) {
    throw new ContextError(`Invalid site context: ${reader.problems.join(' ')}`);
  }
  return {
    workload,
    environment,
    deployer,
    repository,
    branch,
    connectionArn,
    priceTier,
    buildImage,
  };
}
