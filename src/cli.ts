#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { resolve as resolvePath } from 'path';
import * as packageJson from '../package.json';
import { CertificateManager } from './certificates/certificate-manager';
import { loadCertificateParameters } from './certificates/parameter-artifact';
import { summarizeCertificate } from './certificates/pem';
import { createConfigLoader, environmentDefaultsFor, resolve } from './config/loader';
import { createNamingService } from './config/naming';
import { EnvironmentFile } from './config/types';
import { ProvisionerError, UsageError, errorMessage } from './errors';
import { Logger } from './logging/logger';
import { createDeploymentOrchestrator } from './orchestration';
import { ACMManager } from './provisioning/acm-manager';
import { CertificateBundle, CertificateHandle, DeploymentContext, OrchestratorState } from './types';
import { createEnvironmentValidator, writeReport } from './validation';

export const DEFAULT_CONFIG_FILE = 'deploy.yml';
export const DEFAULT_CERTIFICATE_DIR = 'certificates';
export const DEFAULT_DOMAIN = 'example.com';

const CONFIG_OPTION_DESCRIPTION = `Environment configuration file (default: ${DEFAULT_CONFIG_FILE})`;

interface TargetOptions {
  project?: string;
  env?: string;
  region?: string;
  config?: string;
}

interface DeployOptions extends TargetOptions {
  usePrivateCert?: boolean;
  verbose?: boolean;
}

interface CertificateOptions extends TargetOptions {
  generateSelfSigned?: boolean;
  importExisting?: boolean;
  domain: string;
  output: string;
}

interface ValidateOptions extends TargetOptions {
  reportDir?: string;
}

const PHASE_MESSAGES: Record<OrchestratorState, string> = {
  Idle: 'Validating CloudFormation templates...',
  TemplatesValidated: 'Deploying Cognito stack...',
  DirectoryStackDeployed: 'Discovering default VPC and subnets...',
  NetworkDiscovered: 'Deploying ALB stack...',
  RoutingStackDeployed: 'Collecting stack outputs...',
  Done: 'Deployment finished'
};

async function loadEnvironmentFile(configPath: string | undefined): Promise<EnvironmentFile> {
  const loader = createConfigLoader();
  // Only an explicitly named file has to exist
  if (configPath) {
    return loader.load(resolvePath(process.cwd(), configPath));
  }
  return loader.loadOptional(resolvePath(process.cwd(), DEFAULT_CONFIG_FILE));
}

/**
 * Resolves the deployment target the same way for every command
 */
async function resolveTarget(
  options: TargetOptions,
  usePrivateCertificate?: boolean
): Promise<{ context: DeploymentContext; environmentFile: EnvironmentFile }> {
  const environmentFile = await loadEnvironmentFile(options.config);
  const context = resolve({
    project: options.project,
    environment: options.env,
    region: options.region,
    usePrivateCertificate
  }, environmentFile);
  return { context, environmentFile };
}

/**
 * Prints a fatal error and returns the exit code for it
 */
export function reportError(error: unknown, verbose = false): number {
  if (error instanceof ProvisionerError) {
    console.error(chalk.red(`❌ ${error.code}: ${error.message}`));
    if (error.remediation) {
      console.error(chalk.yellow(`💡 ${error.remediation}`));
    }
    if (error.retryable) {
      console.error(chalk.gray('Completed steps are kept; re-running the same command resumes the deployment.'));
    }
    if (verbose) {
      console.error(error);
    }
    return error.exitCode;
  }

  console.error(chalk.red('❌ Error:'), errorMessage(error));
  if (verbose) {
    console.error(error);
  }
  return 1;
}

export function buildProgram(setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('eb-auth')
    .description('Provision Cognito authentication in front of an Elastic Beanstalk load balancer')
    .version(packageJson.version)
    .exitOverride();

  program
    .command('deploy')
    .description('Deploy the Cognito and ALB stacks for an environment')
    .option('-p, --project <name>', 'Project name')
    .option('-e, --env <env>', 'Deployment environment')
    .option('-r, --region <region>', 'AWS region')
    .option('--use-private-cert', 'Use the private certificate registered for the environment')
    .option('--no-use-private-cert', 'Use a managed certificate even if the environment selects a private one')
    .option('-c, --config <path>', CONFIG_OPTION_DESCRIPTION)
    .option('-v, --verbose', 'Enable verbose logging')
    .action(async (options: DeployOptions) => {
      const { context, environmentFile } = await resolveTarget(options, options.usePrivateCert);

      const naming = createNamingService();
      let certificate: CertificateHandle | undefined;
      if (context.certificateMode === 'private') {
        certificate = await loadCertificateParameters(
          naming.artifactPaths(context.environment).certificateParameters,
          context.environment
        );
        console.log(chalk.blue(`🔐 Using private certificate: ${certificate.arn}`));
      }

      const spinner = ora(PHASE_MESSAGES.Idle).start();
      try {
        const orchestrator = createDeploymentOrchestrator(context, {
          logger: new Logger('deploy', options.verbose ? 'debug' : 'warn'),
          onStateChange: state => {
            spinner.text = PHASE_MESSAGES[state];
          }
        });
        const summary = await orchestrator.deploy({
          context,
          certificate,
          parameterOverrides: environmentDefaultsFor(environmentFile, context.environment).parameterOverrides
        });

        spinner.succeed('Deployment completed successfully! 🎉');

        console.log(chalk.green('\n✅ Deployment Information:'));
        console.log(`  Cognito User Pool ID: ${summary.outputs.userPoolId ?? chalk.gray('(missing)')}`);
        console.log(`  Cognito Domain: ${summary.outputs.userPoolDomain ?? chalk.gray('(missing)')}`);
        console.log(`  ALB DNS Name: ${summary.outputs.loadBalancerDnsName ?? chalk.gray('(missing)')}`);
        if (summary.outputs.loadBalancerDnsName) {
          console.log(`  Application URL: ${chalk.underline(`https://${summary.outputs.loadBalancerDnsName}`)}`);
        }

        const missing = summary.findings.filter(finding => finding.status === 'Fail');
        if (missing.length > 0) {
          console.log(chalk.yellow('\n⚠️  Output warnings:'));
          missing.forEach(finding => console.log(`  ${finding.detail}`));
        }

        console.log(chalk.blue('\nNext steps:'));
        console.log('1. Create an Elastic Beanstalk application and environment');
        console.log('2. Deploy your application with the .ebextensions configurations');
        console.log('3. Update your application\'s callback URLs in Cognito');
        console.log('4. Test the authentication flow');

        console.log(chalk.gray(`\n⏱️  Deployment took ${summary.durationMs}ms`));
        console.log(chalk.gray(`🆔 Deployment ID: ${summary.deploymentId}`));
        setExitCode(0);
      } catch (error) {
        spinner.fail('Deployment failed');
        throw error;
      }
    });

  program
    .command('certificate')
    .description('Generate or import a private certificate and register it with ACM')
    .option('--generate-self-signed', 'Generate a new self-signed certificate')
    .option('--import-existing', 'Import certificate files from the output directory')
    .option('-d, --domain <domain>', 'Domain name for the certificate', DEFAULT_DOMAIN)
    .option('-p, --project <name>', 'Project name')
    .option('-e, --env <env>', 'Deployment environment')
    .option('-r, --region <region>', 'AWS region')
    .option('-o, --output <dir>', 'Directory holding the certificate files', DEFAULT_CERTIFICATE_DIR)
    .option('-c, --config <path>', CONFIG_OPTION_DESCRIPTION)
    .action(async (options: CertificateOptions) => {
      if (Boolean(options.generateSelfSigned) === Boolean(options.importExisting)) {
        throw new UsageError('Specify exactly one of --generate-self-signed or --import-existing', {
          remediation: 'Run: eb-auth certificate --generate-self-signed -d <domain>'
        });
      }

      const { context } = await resolveTarget(options, true);
      const outputDirectory = resolvePath(process.cwd(), options.output);
      const manager = new CertificateManager({
        store: new ACMManager(context.region),
        naming: createNamingService(),
        logger: new Logger('certificate', 'warn')
      });

      const spinner = ora('Preparing certificate...').start();
      try {
        let bundle: CertificateBundle;
        if (options.generateSelfSigned) {
          spinner.text = `Generating self-signed certificate for ${options.domain}...`;
          bundle = manager.generateSelfSigned(options.domain, context.projectName, context.environment);
          await manager.writeBundle(bundle, outputDirectory);
        } else {
          spinner.text = `Validating certificate files in ${outputDirectory}...`;
          bundle = await manager.importExisting(outputDirectory);
        }

        const local = summarizeCertificate(bundle.certificatePem);
        spinner.info(`Certificate ${local.subject} valid until ${local.notAfter.toISOString()} (${local.dnsNames.join(', ')})`);
        spinner.start();

        spinner.text = 'Importing certificate to AWS Certificate Manager...';
        const result = await manager.registerCertificate(bundle, { context, outputDirectory });
        spinner.succeed('Certificate imported successfully to ACM');

        console.log(chalk.green('\n✅ Certificate Details:'));
        console.log(`  ARN: ${result.handle.arn}`);
        try {
          const metadata = await manager.describeCertificate(result.handle.arn);
          console.log(`  Domain: ${metadata.domainName ?? options.domain}`);
          console.log(`  Status: ${metadata.status ?? 'unknown'}`);
          if (metadata.notAfter) {
            console.log(`  Expires: ${metadata.notAfter.toISOString()}`);
          }
        } catch (error) {
          console.log(chalk.yellow(`  Could not read certificate details: ${errorMessage(error)}`));
        }

        console.log(chalk.blue('\n📁 Files Created:'));
        console.log(`  ${result.parameterFile}`);
        console.log(`  ${result.handleFile}`);

        console.log(chalk.blue('\nNext steps:'));
        console.log(`1. Review the generated parameter file: ${result.parameterFile}`);
        console.log(`2. Deploy with: ${chalk.cyan(`eb-auth deploy -e ${context.environment} --use-private-cert`)}`);
        console.log('3. Ensure your DNS points to the ALB after deployment');
        setExitCode(0);
      } catch (error) {
        spinner.fail('Certificate setup failed');
        throw error;
      }
    });

  program
    .command('validate')
    .description('Check local artifacts and the live stacks, and write a report')
    .option('-p, --project <name>', 'Project name')
    .option('-e, --env <env>', 'Deployment environment')
    .option('-r, --region <region>', 'AWS region')
    .option('--report-dir <dir>', 'Directory for the validation report (default: current directory)')
    .option('-c, --config <path>', CONFIG_OPTION_DESCRIPTION)
    .action(async (options: ValidateOptions) => {
      const { context } = await resolveTarget(options);
      const baseDir = process.cwd();

      const run = await createEnvironmentValidator(context, baseDir).validate(context);
      const reportPath = await writeReport(run, resolvePath(baseDir, options.reportDir ?? '.'), baseDir);
      console.log(chalk.blue(`\n📄 Validation report generated: ${reportPath}`));

      if (run.passed) {
        console.log(chalk.green('All validation checks passed! ✅'));
        setExitCode(0);
      } else {
        const failures = run.findings.filter(finding => finding.status === 'Fail').length;
        console.log(chalk.red(`Validation failed: ${failures} check(s) failed ❌`));
        setExitCode(1);
      }
    });

  return program;
}

/**
 * Parses argv, runs the selected command and resolves to the exit code
 */
export async function run(argv: string[] = process.argv): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(code => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version output exit cleanly; commander has already printed the rest
      if (error.exitCode === 0) {
        return 0;
      }
      return new UsageError(error.message).exitCode;
    }
    return reportError(error, argv.includes('--verbose') || argv.includes('-v'));
  }

  return exitCode;
}

if (require.main === module) {
  run()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(chalk.red('❌ Unexpected error:'), errorMessage(error));
      process.exitCode = 1;
    });
}
