export { JsonFormatter } from "./json.js"
export { PrettyFormatter } from "./pretty.js"
