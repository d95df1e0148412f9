export type Runtime = {
    production: boolean;
    verbose: boolean;
    logLevel: 'silent' | 'info' | 'debug';
    pretty: boolean;
};

// JEST_WORKER_ID is set by Jest; also honor NODE_ENV=test
export function isTestEnv(env: NodeJS.ProcessEnv = process.env): boolean {
    return !!(env.JEST_WORKER_ID || env.NODE_ENV === "test");
}

export function resolveRuntime(env: NodeJS.ProcessEnv = process.env): Runtime {
    const production = env.PD_PRODUCTION === "true";
    const verbose = env.PD_VERBOSE === "true" && !production;
    const testing = isTestEnv(env);

    const pretty = !production && !testing;
    const logLevel = testing ? 'silent' : (verbose ? 'debug' : 'info');

    return {
        production,
        verbose,
        logLevel,
        pretty,
    };
}
