/**
 * Error Module
 *
 * Coded error base class shared by every ordkit package.
 */

export { ToolkitError, describeValue } from "./ToolkitError.js";
