import { extractHtmlText } from './html-extractor';

describe('extractHtmlText', () => {
  it('should prefer the article region and drop navigation chrome', () => {
    const html = `
      <html><body>
        <nav>Home | Acts | Contact</nav>
        <header>Legislative Department</header>
        <article>
          <h1>Section 420</h1>
          <p>Cheating and dishonestly inducing delivery of property.</p>
        </article>
        <footer>Copyright</footer>
        <script>track()</script>
      </body></html>`;

    expect(extractHtmlText(html)).toBe(
      'Section 420\nCheating and dishonestly inducing delivery of property.',
    );
  });

  it('should fall back to paragraphs when there is no main region', () => {
    const html = '<div><p>First   para.</p><p>Second para.</p><p> </p><style>p{}</style></div>';

    expect(extractHtmlText(html)).toBe('First para.\nSecond para.');
  });

  it('should fall back to body text when there are no paragraphs', () => {
    const html = '<body><div>Notification No. 12</div><div>dated 1 May</div></body>';

    expect(extractHtmlText(html)).toBe('Notification No. 12\ndated 1 May');
  });

  it('should skip a primary region that is too short to be the content', () => {
    const html =
      '<main>Menu</main><p>The High Court granted anticipatory bail to the applicant.</p>';

    expect(extractHtmlText(html)).toBe('The High Court granted anticipatory bail to the applicant.');
  });
});
