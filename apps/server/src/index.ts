export { createServer, parseGesture, runServer, type CreateServerOptions, type RunServerOptions } from "./app.js";
export { EditorViews, type EditorViewsEvent, type EditorViewsOptions, type FileView } from "./views.js";
