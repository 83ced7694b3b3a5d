import type { PluginOption } from "vite";

export const workbookDevPlugin = (): PluginOption => ({
  name: "workbook-dev-endpoint",
  configureServer(server) {
    server.middlewares.use("/api/workbook", async (req, res, next) => {
      try {
        const module = await import("./api/workbook");
        await module.default(req, res);
      } catch (error) {
        console.error("[workbook-api] dev handler error", error);
        res.statusCode = 500;
        res.end(
          JSON.stringify({
            ok: false,
            error: "Dev handler error",
            requestId: "dev"
          })
        );
        return;
      }
      if (!res.writableEnded) {
        next();
      }
    });
  }
});
