import { createApp } from "./index.js";

const PORT = process.env["PORT"] ? parseInt(process.env["PORT"], 10) : 4000;

const { app } = createApp({
  username: process.env["JIRA_USERNAME"],
  apiToken: process.env["JIRA_API_TOKEN"],
});
app.listen(PORT, () => {
  console.log(`mock Jira API listening on port ${PORT}`);
});
