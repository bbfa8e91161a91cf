/**
 * Application Class
 *
 * The main entry point for building applications. Collects routes,
 * middleware and error handlers during setup, then freezes them into a
 * single connection handler the first time a request arrives.
 */

import { Config, loadConfig, type AppSettings, type ConfigOptions } from './config/config.ts';
import { ConfigurationError } from './errors.ts';
import { createDispatcher } from './http/dispatcher.ts';
import { Server, type ServerOptions } from './http/server.ts';
import type { Address, ConnectionHandler } from './http/transport.ts';
import type { ErrorHandler, ErrorKey, Handler, Middleware, PathParams } from './http/types.ts';
import { MiddlewarePipeline } from './middleware/pipeline.ts';
import { Router } from './router/router.ts';
import { Lifecycle, type LifecycleHook } from './runtime/lifecycle.ts';
import { Logger } from './telemetry/logger.ts';
import type { Renderer } from './view/template.ts';

export interface ApplicationOptions {
  config?: Config | ConfigOptions;
  renderer?: Renderer | null;
  logger?: Logger;
}

export interface RouteOptions {
  methods?: readonly string[];
  name?: string;
}

/**
 * Main Application class
 */
export class Application {
  private readonly router = new Router();
  private readonly middleware: MiddlewarePipeline;
  private readonly errorHandlers = new Map<ErrorKey, ErrorHandler>();
  private readonly config: Config;
  private readonly settings: AppSettings;
  private readonly logger: Logger;
  private readonly lifecycle: Lifecycle;
  private readonly renderer: Renderer | null;
  private dispatcher: ConnectionHandler | null = null;
  private server: Server | null = null;

  constructor(options: ApplicationOptions = {}) {
    this.config = options.config instanceof Config ? options.config : new Config(options.config);
    this.settings = this.config.settings();
    this.logger =
      options.logger ??
      new Logger({
        level: this.settings.logLevel,
        format: this.settings.env === 'production' ? 'json' : 'pretty',
      });
    this.renderer = options.renderer ?? null;
    this.middleware = new MiddlewarePipeline(this.logger);
    this.lifecycle = new Lifecycle(this.logger);
  }

  /**
   * Build an application from a config file and the environment
   */
  static async fromConfig(
    configPath?: string,
    options: Omit<ApplicationOptions, 'config'> = {}
  ): Promise<Application> {
    return new Application({ ...options, config: await loadConfig(configPath) });
  }

  get isFrozen(): boolean {
    return this.dispatcher !== null;
  }

  get debug(): boolean {
    return this.settings.debug;
  }

  /**
   * Register a route for one or more methods
   */
  route(path: string, handler: Handler, options: RouteOptions = {}): this {
    this.assertMutable(`route '${path}'`);
    this.router.register(path, handler, options.methods ?? ['GET'], options.name);
    return this;
  }

  /**
   * Register a GET route
   */
  get(path: string, handler: Handler, name?: string): this {
    return this.route(path, handler, { methods: ['GET'], name });
  }

  /**
   * Register a POST route
   */
  post(path: string, handler: Handler, name?: string): this {
    return this.route(path, handler, { methods: ['POST'], name });
  }

  /**
   * Register a PUT route
   */
  put(path: string, handler: Handler, name?: string): this {
    return this.route(path, handler, { methods: ['PUT'], name });
  }

  /**
   * Register a PATCH route
   */
  patch(path: string, handler: Handler, name?: string): this {
    return this.route(path, handler, { methods: ['PATCH'], name });
  }

  /**
   * Register a DELETE route
   */
  delete(path: string, handler: Handler, name?: string): this {
    return this.route(path, handler, { methods: ['DELETE'], name });
  }

  /**
   * Add global middleware. The first added is the outermost.
   */
  use(middleware: Middleware): this {
    this.assertMutable('middleware');
    this.middleware.use(middleware);
    return this;
  }

  /**
   * Register an error handler for a status code or an error class
   */
  error(key: ErrorKey, handler: ErrorHandler): this {
    this.assertMutable(`error handler for ${typeof key === 'number' ? key : key.name}`);
    this.errorHandlers.set(key, handler);
    return this;
  }

  onStartup(hook: LifecycleHook): this {
    this.lifecycle.onStart(hook);
    return this;
  }

  onShutdown(hook: LifecycleHook): this {
    this.lifecycle.onShutdown(hook);
    return this;
  }

  /**
   * URL of a named route
   */
  url(name: string, params: PathParams = {}): string {
    return this.router.url(name, params);
  }

  /**
   * Compile routes and compose middleware. Runs once; later calls are no-ops.
   */
  freeze(): this {
    this.ensureDispatcher();
    return this;
  }

  /**
   * Transport entry point; freezes the application on first use
   */
  readonly handle: ConnectionHandler = async (scope, receive, send) => {
    await this.ensureDispatcher()(scope, receive, send);
  };

  /**
   * Run startup hooks
   */
  async startup(): Promise<void> {
    this.freeze();
    await this.lifecycle.emitStart();
  }

  /**
   * Run shutdown hooks
   */
  async shutdown(reason?: string): Promise<void> {
    await this.lifecycle.shutdown(reason);
  }

  /**
   * Start the HTTP server
   */
  async listen(options: Omit<ServerOptions, 'logger'> = {}): Promise<Address> {
    if (this.server) {
      throw new ConfigurationError('Application is already listening.');
    }

    await this.startup();

    const server = new Server(this.handle, {
      port: this.settings.port,
      host: this.settings.host,
      ...options,
      logger: this.logger,
    });
    this.server = server;
    return await server.listen();
  }

  /**
   * Stop the server, then run shutdown hooks
   */
  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (server) {
      await server.stop();
    }
    await this.shutdown('Server stopped');
    this.logger.info('Application stopped');
  }

  getConfig(): Config {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  getLifecycle(): Lifecycle {
    return this.lifecycle;
  }

  /**
   * Registered routes, for inspection
   */
  routes(): Array<{ methods: string[]; path: string; name?: string }> {
    return this.router.routes.map((route) => ({
      methods: [...route.methods].sort(),
      path: route.path,
      name: route.name,
    }));
  }

  private ensureDispatcher(): ConnectionHandler {
    if (!this.dispatcher) {
      this.dispatcher = createDispatcher({
        router: this.router,
        middleware: this.middleware,
        errorHandlers: this.errorHandlers,
        renderer: this.renderer,
        debug: this.settings.debug,
        logger: this.logger,
        sseHeartbeatInterval: this.settings.sseHeartbeatInterval,
        sseRetryMs: this.settings.sseRetryMs,
        sseCloseEvent: this.settings.sseCloseEvent,
      });
      this.logger.debug('Application frozen', { routes: this.router.routes.length });
    }
    return this.dispatcher;
  }

  private assertMutable(what: string): void {
    if (this.dispatcher) {
      throw new ConfigurationError(
        `Cannot register ${what}: the application is frozen once it starts handling requests.`
      );
    }
  }
}
