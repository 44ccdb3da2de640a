import chalk from 'chalk';

export const logger = {
  info(msg: string) {
    console.log(chalk.blue('ℹ'), msg);
  },

  success(msg: string) {
    console.log(chalk.green('✔'), msg);
  },

  warn(msg: string) {
    console.warn(chalk.yellow('⚠'), msg);
  },

  error(msg: string) {
    console.error(chalk.red('✖'), msg);
  },

  debug(msg: string) {
    if (process.env.DEBUG) {
      console.error(chalk.gray('⚙'), chalk.gray(msg));
    }
  },

  dim(msg: string) {
    console.log(chalk.dim(msg));
  },

  hint(msg: string) {
    console.error(chalk.cyan('→'), msg);
  },
};
