export { errorHandler, notFoundHandler, asyncHandler } from "./error.middleware"
export { parseRequest, type RequestLocation, type ValidationIssue } from "./validation.middleware"
