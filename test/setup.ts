import "dotenv/config";

process.env.COINRPC_LOG_LEVEL ??= "silent";
