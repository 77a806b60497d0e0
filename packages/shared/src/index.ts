export * from "./brewStages.js";
export * from "./notificationActions.js";
export * from "./notificationData.js";
export * from "./interactionSurfaces.js";
export * from "./navigationChannel.js";
export * from "./actionRouter.js";
