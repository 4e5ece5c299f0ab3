import { Command } from 'commander';
import { formatError } from '../output/formatter.js';

export const configCommand = new Command('config')
  .description('Inspect Tally configuration');

configCommand
  .command('show')
  .description('Show the effective configuration (secret masked)')
  .option('-c, --config <path>', 'Config file')
  .action(async (options: { config?: string }) => {
    const { ConfigManager, redactConfig } = await import('@tally/server');

    try {
      const config = await new ConfigManager().load({ configPath: options.config });
      console.log(JSON.stringify(redactConfig(config), null, 2));
    } catch (err) {
      console.error(`Error: ${formatError(err)}`);
      process.exit(1);
    }
  });

configCommand
  .command('path')
  .description('Show config file search paths')
  .action(() => {
    console.log('Config files searched in the working directory and its parents (first found wins):');
    console.log('  1. tally.config.yaml');
    console.log('  2. tally.config.yml');
    console.log('  3. tally.config.json');
    console.log('');
    console.log('Environment variables:');
    console.log('  TALLY_JWT_SECRET');
    console.log('  TALLY_TOKEN_EXPIRE_MINUTES');
    console.log('  TALLY_DB_PATH');
    console.log('  TALLY_PORT');
    console.log('  TALLY_HOST');
    console.log('  TALLY_LOG_LEVEL');
  });
