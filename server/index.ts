import { createApp } from "./app";
import { NODE_ENV, PORT, PROFILES_PATH, SESSION_SECRET, SETTINGS_PATH, TRANSACTIONS_PATH } from "./config";
import { log } from "./logger";
import { ProfileStore } from "./profileStore";
import { SettingsStore } from "./settingsStore";

(async () => {
  const profiles = new ProfileStore();
  await profiles.loadFromDisk(PROFILES_PATH, TRANSACTIONS_PATH);

  const { server } = await createApp({
    profiles,
    settings: new SettingsStore(SETTINGS_PATH),
    sessionSecret: SESSION_SECRET,
    secureCookies: NODE_ENV === "production",
  });

  server.listen(PORT, "0.0.0.0", () => {
    log(`serving on port ${PORT}`);
  });
})().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
