import type { Server } from "node:http";
import express from "express";

import { createDashboardRouter } from "./routes/dashboard";

export interface ServerOptions {
	/** Directory holding manifest.json and the artifacts it lists. */
	outputDir: string;
}

export function createApp( options: ServerOptions ): express.Express {
	const app = express();

	app.disable( "x-powered-by" );
	app.use( "/api", createDashboardRouter( options.outputDir ) );

	app.get( "/", ( _req, res ) => {
		res.send( "Hourly weather pipeline is up and running!" );
	} );

	app.use( ( _req, res ) => {
		res.status( 404 ).json( { error: "NotFound" } );
	} );

	return app;
}

/** Starts listening. Port 0 picks a free port. */
export function startServer( port: number, options: ServerOptions ): Promise<Server> {
	const app = createApp( options );
	return new Promise( ( resolve, reject ) => {
		const server = app.listen( port, () => {
			const address = server.address();
			const bound = typeof address === "object" && address ? address.port : port;
			console.log( `[Server] Listening on port ${ bound }, serving ${ options.outputDir }` );
			resolve( server );
		} );
		server.on( "error", reject );
	} );
}
