import { createApp } from "./app.js";

const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

const app = createApp();

app.listen(PORT, () => {
  console.log(`\n[server] Cycling quality API running at http://localhost:${PORT}`);
  console.log(`[server] Profiles: http://localhost:${PORT}/api/config/profiles\n`);
});
