// Page setup, running header with the current section name, base font and heading styles.
// Level-1 headings are hidden in the body and only appear through the page header.
export const TYPST_PREAMBLE = `#set page(paper: "a4", numbering: "1/1", margin: (x: 1.5cm, y: 2cm), header: context {
  let dominated-page = here().page()
  let dominated = query(heading.where(level: 1)).filter(h => h.location().page() <= dominated-page)
  if dominated.len() > 0 {
    let current = dominated.last()
    align(center, text(size: 16pt, weight: "bold", underline(current.body)))
  }
})
#set text(size: 8pt, font: "Lato")
#set par(leading: 0.5em)
#show heading: set block(sticky: true)
#show heading.where(level: 1): it => {}
#show heading.where(level: 2): set text(size: 10pt, weight: "bold")
#show heading.where(level: 2): set block(below: 0.7em)
`;
