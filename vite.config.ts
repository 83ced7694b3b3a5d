import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import { workbookDevPlugin } from "./vite.workbookDevPlugin";

export default defineConfig({
  plugins: [react(), workbookDevPlugin()]
});
