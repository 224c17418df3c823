import swaggerAutogen from "swagger-autogen";
import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const doc = {
  info: {
    title: "File Picker API",
    description:
      "API for driving file picker sessions: open a dialog, navigate directories, select or name a file, create folders inline and confirm.",
    version: "1.0.0",
  },
  host: "localhost:8000",
  basePath: "/api/dialogs",
  schemes: ["http"],
  tags: [
    {
      name: "Dialogs",
      description:
        "Dialog session lifecycle, navigation history, selection, save names and inline directory creation",
    },
  ],
};

const outputFile = path.join(__dirname, "../swagger.json");
const routes = [path.join(__dirname, "routes/dialogs.ts")];

const options = {
  openapi: "3.0.0" as const,
};

swaggerAutogen(options)(outputFile, routes, doc)
  .then((result) => {
    if (result && typeof result === "object" && "success" in result && result.success) {
      console.log("Swagger spec generated:", outputFile);
    } else {
      console.error("Swagger generation failed");
      process.exit(1);
    }
  })
  .catch((err: unknown) => {
    console.error("Swagger generation failed:", err);
    process.exit(1);
  });
