// eslint-disable-next-line @typescript-eslint/no-var-requires
const swaggerAutogen = require("swagger-autogen")({ openapi: "3.0.0" });

const doc = {
  info: {
    title: "File Drop",
    description:
      "Upload files over multipart/form-data, list them and download them again.",
    version: "1.0.0",
  },
  host: "localhost:8080",
  schemes: ["http"],
  tags: [
    { name: "Health", description: "Health check endpoints" },
    { name: "Files", description: "Upload, listing and download" },
  ],
};

const outputFile = "./src/swagger/swagger-output.json";
const endpointFiles = [
  "./src/controllers/health.controller.ts",
  "./src/controllers/files.controller.ts",
];

swaggerAutogen(outputFile, endpointFiles, doc).then(() => {
  console.log("Swagger documentation generated successfully");
});
