import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const CliSchema = z
  .object({
    job: z.string().trim().min(1).optional(),
    location: z.string().trim().optional(),
    contract: z.string().trim().min(1).optional(),
    pages: z.coerce.number().int().positive().default(1),
    rateLimit: z.coerce.number().nonnegative().optional(),
    useProxies: z.boolean(),
    letters: z.boolean(),
    debug: z.boolean(),
    csv: z.string().min(1).optional(),
    sheet: z.string().min(1).optional(),
    saveState: z.boolean(),
    resume: z.string().min(1).optional(),
    configPath: z.string().min(1).default('config.yaml'),
    validate: z.boolean(),
    help: z.boolean(),
  })
  .superRefine((value, ctx) => {
    if (!value.job && !value.resume && !value.validate && !value.help) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['job'], message: '--job is required' });
    }
  });

export type CliOptions = z.infer<typeof CliSchema>;

export function readFlag(args: string[], name: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === name) {
      const value = args[i + 1];
      return value !== undefined && !value.startsWith('--') ? value : undefined;
    }
    if (arg.startsWith(`${name}=`)) return arg.slice(name.length + 1);
  }
  return undefined;
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

export function parseCliArgs(args: string[]): CliOptions {
  const result = CliSchema.safeParse({
    job: readFlag(args, '--job'),
    location: readFlag(args, '--location'),
    contract: readFlag(args, '--contract'),
    pages: readFlag(args, '--pages'),
    rateLimit: readFlag(args, '--rate-limit'),
    useProxies: hasFlag(args, '--proxies'),
    letters: hasFlag(args, '--letters'),
    debug: hasFlag(args, '--debug'),
    csv: readFlag(args, '--csv'),
    sheet: readFlag(args, '--sheet'),
    saveState: hasFlag(args, '--save-state'),
    resume: readFlag(args, '--resume'),
    configPath: readFlag(args, '--config'),
    validate: hasFlag(args, '--validate'),
    help: hasFlag(args, '--help') || hasFlag(args, '-h'),
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid arguments — ${problems.join('; ')}`);
  }
  return result.data;
}

export const HELP = `Usage: offer-relay --job <query> [options]
       offer-relay --resume <file> [options]

  --job <query>        job title or keywords to search (required)
  --location <place>   location filter
  --contract <type>    keep only listings of this contract type (cdi, cdd, alternance, stage…)
  --pages <n>          number of result pages to fetch (default 1)
  --rate-limit <s>     minimum seconds between requests (default from config, 2)
  --proxies            rotate through the proxies listed in the proxy file
  --letters            draft an application letter for every listing
  --debug              keep the raw HTML of every fetched page
  --csv <path>         write listings to a CSV file
  --sheet <title>      append listings to a Google Sheets spreadsheet
  --save-state         save the collected listings to saves/scraping_state_<stamp>.json
  --resume <file>      reuse the listings of a saved state instead of fetching result pages
  --config <path>      configuration file (default config.yaml)
  --validate           check the configuration and exit
`;
