import { Configuration } from '../services/Configuration';
import { Logger } from '../services/Logger';
import { RedactionClient } from '../services/RedactionClient';
import { JobScheduler } from '../services/JobScheduler';
import { OutputRepository } from '../repositories/OutputRepository';
import { CsvAdapter } from '../adapters/CsvAdapter';
import { JsonAdapter } from '../adapters/JsonAdapter';
import { RedactionJob } from '../models/RedactionJob';
import { BatchRunner } from '../runner';
import {
  IInputAdapter,
  ILogger,
  IOutputRepository,
  IRedactionClient
} from '../interfaces/services';

interface Registration<T> {
  factory: () => T;
  singleton: boolean;
  instance?: T;
}

type Registry<TServices> = { [K in keyof TServices]?: Registration<TServices[K]> };

// Dependency Injection Container following Dependency Inversion Principle
export class DIContainer<TServices> {
  private registrations: Registry<TServices> = {};

  // Register a service
  register<K extends keyof TServices>(name: K, factory: () => TServices[K], singleton: boolean = true): void {
    this.registrations[name] = { factory, singleton };
  }

  // Get a service instance
  get<K extends keyof TServices>(name: K): TServices[K] {
    const registration = this.registrations[name];
    if (!registration) {
      throw new Error(`Service ${String(name)} not registered`);
    }

    if (!registration.singleton) {
      return registration.factory();
    }
    if (registration.instance === undefined) {
      registration.instance = registration.factory();
    }
    return registration.instance;
  }

  // Check if service is registered
  has(name: keyof TServices): boolean {
    return this.registrations[name] !== undefined;
  }
}

export interface ApplicationServices {
  config: Configuration;
  logger: ILogger;
  redactionClient: IRedactionClient;
  outputRepository: IOutputRepository;
  inputAdapters: IInputAdapter[];
  scheduler: JobScheduler;
  batchRunner: BatchRunner;
}

export class ApplicationContainer {
  private container: DIContainer<ApplicationServices>;

  constructor() {
    this.container = new DIContainer<ApplicationServices>();
  }

  initialize(): void {
    // Register basic services first
    this.registerBasicServices();

    // Filesystem side: adapters and the output artifacts
    this.registerDataServices();

    // Service client, scheduler and the batch runner on top
    this.registerBusinessServices();
  }

  private registerBasicServices(): void {
    this.container.register('config', () => new Configuration());

    this.container.register('logger', () =>
      Logger.create('redaction-runner')
    );
  }

  private registerDataServices(): void {
    this.container.register('outputRepository', () =>
      new OutputRepository(
        this.getConfiguration().getInputSettings().outputDir,
        this.getLogger()
      )
    );

    this.container.register('inputAdapters', () => {
      const input = this.getConfiguration().getInputSettings();
      return [new CsvAdapter(input.csvDelimiter), new JsonAdapter(input.jsonMapping)];
    });
  }

  private registerBusinessServices(): void {
    this.container.register('redactionClient', () =>
      new RedactionClient(
        this.getConfiguration().getRedactionServiceSettings(),
        this.getLogger()
      )
    );

    this.container.register('scheduler', () => {
      const config = this.getConfiguration();
      const jobSettings = config.getJobSettings();
      const client = this.container.get('redactionClient');
      const logger = this.getLogger();

      return new JobScheduler(
        { maxConcurrency: config.getMaxConcurrency() },
        (document) => new RedactionJob(document, { client, settings: jobSettings, logger }),
        this.container.get('outputRepository'),
        logger
      );
    });

    this.container.register('batchRunner', () =>
      new BatchRunner(
        { inputDir: this.getConfiguration().getInputSettings().inputDir },
        this.container.get('inputAdapters'),
        this.container.get('outputRepository'),
        this.container.get('scheduler'),
        this.getLogger()
      )
    );
  }

  // Get container for dependency injection
  getContainer(): DIContainer<ApplicationServices> {
    return this.container;
  }

  getConfiguration(): Configuration {
    return this.container.get('config');
  }

  getLogger(): ILogger {
    return this.container.get('logger');
  }

  getBatchRunner(): BatchRunner {
    return this.container.get('batchRunner');
  }
}
