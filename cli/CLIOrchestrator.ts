import * as path from 'path';
import { version } from '@core/version';
import { ConfigLoader } from '@core/config/loader';
import type { MdtaskConfig } from '@core/config/types';
import { toInterpreterSpecs } from '@core/config/utils';
import { LanguageRegistry } from '@core/registry/LanguageRegistry';
import { DocumentNotFoundError } from '@core/errors';
import { ExitCode } from '@core/constants/exit-codes';
import { cliLogger as logger, setLogLevel } from '@core/utils/logger';
import { MarkdownParser } from '@parser/MarkdownParser';
import { resolveCommand } from '@interpreter/resolver/CommandResolver';
import { ExecutionEngine } from '@interpreter/engine/ExecutionEngine';
import type { ProcessSpawner } from '@interpreter/engine/ProcessSpawner';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { ErrorHandler } from './error/ErrorHandler';
import { HelpSystem } from './interaction/HelpSystem';
import { renderTree } from './interaction/TreePrinter';
import { ArgumentParser, type CLIOptions } from './parsers/ArgumentParser';
import { defaultDocumentNames, locateDocument, programNameOf } from './discovery/DocumentLocator';

export interface CLIDependencies {
  fileSystem?: IFileSystemService;
  spawner?: ProcessSpawner;
  cwd?: string;
  /** Environment handed to executed code blocks */
  env?: NodeJS.ProcessEnv;
  /** Path the program was invoked as; exported to code blocks as MD_EXE */
  executablePath?: string;
  loadConfig?: (projectDirectory: string) => MdtaskConfig;
  stdout?: (text: string) => void;
  stderr?: (line: string) => void;
  color?: boolean;
}

export class CLIOrchestrator {
  private readonly argumentParser = new ArgumentParser();
  private readonly helpSystem = new HelpSystem();
  private readonly fileSystem: IFileSystemService;
  private readonly cwd: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly executablePath: string;
  private readonly programName: string;
  private readonly loadConfig: (projectDirectory: string) => MdtaskConfig;
  private readonly stdout: (text: string) => void;

  constructor(private readonly deps: CLIDependencies = {}) {
    this.fileSystem = deps.fileSystem ?? new NodeFileSystem();
    this.cwd = deps.cwd ?? process.cwd();
    this.env = deps.env ?? process.env;
    this.executablePath = deps.executablePath ?? process.argv[1] ?? 'mdtask';
    this.programName = programNameOf(this.executablePath);
    this.loadConfig = deps.loadConfig ?? (dir => new ConfigLoader(dir).load());
    this.stdout = deps.stdout ?? (text => console.log(text));
  }

  /**
   * @returns The exit status for the process
   */
  async main(args: readonly string[]): Promise<number> {
    let debug = false;

    try {
      const options = this.argumentParser.parseArgs(args);
      debug = options.debug;
      if (options.debug) {
        setLogLevel('debug');
      }

      if (options.version) {
        this.stdout(`${this.programName} version ${version}`);
        return ExitCode.Success;
      }

      const workingConfig = this.applyConfig(this.loadConfig(this.cwd), options);

      if (options.help) {
        this.stdout(
          this.helpSystem.renderHelp({
            programName: this.programName,
            languages: this.registryFor(workingConfig).supportedLanguages(),
            color: this.deps.color
          })
        );
        return ExitCode.Success;
      }

      const documentPath = await this.findDocument(options, workingConfig);
      const documentDir = path.dirname(documentPath);
      const config =
        documentDir === this.cwd ? workingConfig : this.applyConfig(this.loadConfig(documentDir), options);

      return await this.run(options, documentPath, config);
    } catch (error: unknown) {
      return new ErrorHandler({
        programName: this.programName,
        debug,
        color: this.deps.color,
        write: this.deps.stderr
      }).handleError(error);
    }
  }

  private async run(options: CLIOptions, documentPath: string, config: MdtaskConfig): Promise<number> {
    const registry = this.registryFor(config);
    const text = await this.fileSystem.readFile(documentPath);
    const tree = new MarkdownParser(registry).parse(text);

    if (options.headingPath.length === 0) {
      this.stdout(
        renderTree(tree, { title: path.basename(documentPath), verbose: options.verbose, color: this.deps.color })
      );
      return ExitCode.Success;
    }

    const { node, envBindings } = resolveCommand(tree, options.headingPath);
    const engine = new ExecutionEngine({
      registry,
      spawner: this.deps.spawner,
      cwd: this.cwd,
      baseEnv: { ...this.env, MD_EXE: this.executablePath, MD_FILE: documentPath }
    });

    const report = await engine.execute(node, envBindings, options.trailingArgs);
    if (report.state === 'failed') {
      logger.debug('Command failed', {
        heading: node.name,
        block: report.failedBlockIndex,
        exitCode: report.exitCode,
        signal: report.signal
      });
    }
    return report.exitCode;
  }

  private async findDocument(options: CLIOptions, config: MdtaskConfig): Promise<string> {
    if (options.file) {
      const documentPath = path.resolve(this.cwd, options.file);
      if (!(await this.fileSystem.isFile(documentPath))) {
        throw new DocumentNotFoundError([path.basename(documentPath)], path.dirname(documentPath), false);
      }
      return documentPath;
    }

    const names = config.documentNames ?? defaultDocumentNames(this.programName);
    return locateDocument(this.cwd, names, this.fileSystem);
  }

  private applyConfig(config: MdtaskConfig, options: CLIOptions): MdtaskConfig {
    if (config.logLevel && !options.debug) {
      setLogLevel(config.logLevel);
    }
    return config;
  }

  private registryFor(config: MdtaskConfig): LanguageRegistry {
    return LanguageRegistry.withOverrides(toInterpreterSpecs(config.languages));
  }
}
