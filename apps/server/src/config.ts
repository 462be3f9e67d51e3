export default {
  port: parseInt(process.env.PORT || "9001", 10),
  host: process.env.HOST || "0.0.0.0",
  maxConnections: parseInt(process.env.MAX_CONNECTIONS || "1000", 10),
  tickIntervalMs: parseInt(process.env.TICK_INTERVAL_MS || "16", 10),
  heartbeatIntervalMs: parseInt(process.env.HEARTBEAT_INTERVAL_MS || "30000", 10), // 30 seconds
};
