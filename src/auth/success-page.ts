export function getAuthSuccessHTML(closeAfterMs: number = 1000): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Authentication Successful</title>
<script>
  setTimeout(() => { window.close(); }, ${closeAfterMs});
</script>
<style>
  body {
    display: flex;
    justify-content: center;
    align-items: center;
    height: 100vh;
    font-family: Arial, sans-serif;
    font-size: 24px;
    font-weight: bold;
  }
</style>
</head>
<body>
  Authentication successful!
</body>
</html>`;
}
