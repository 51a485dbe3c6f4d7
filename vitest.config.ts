import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "fatal",
      MQTT_BROKER_URL: "mqtt://localhost:1883",
      HUB_HOST: "127.0.0.1",
      HUB_PORT: "1024",
    },
  },
});
