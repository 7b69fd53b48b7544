export function isTestEnv(env: NodeJS.ProcessEnv = process.env) {
    // JEST_WORKER_ID is set by Jest; also honor NODE_ENV=test
    return !!(env.JEST_WORKER_ID || env.NODE_ENV === "test");
}
