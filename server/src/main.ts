import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";
import { describeError } from "./common/errors";

dotenv.config();

const logger = new Logger("Bootstrap");

async function bootstrap() {
	const app = configureApp(await NestFactory.create(AppModule));
	app.enableShutdownHooks();

	const config = new DocumentBuilder()
		.setTitle("Collateral Ledger API")
		.setDescription(
			"Every mutating call acts on the account named in `X-Caller-Identity`",
		)
		.setVersion("0.1.0")
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
		},
	});

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	logger.log(`API listening on http://0.0.0.0:${port}`);
}

bootstrap().catch((error: unknown) => {
	logger.error("Failed to start", describeError(error));
	process.exitCode = 1;
});
